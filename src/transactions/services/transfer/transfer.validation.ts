import { body, query } from 'express-validator';

import {
  optionalDateQuery,
  optionalNumberQuery,
  optionalUuidQuery,
  pageQueryValidation,
  uuidParam,
} from '../../../common/http/validation';

export const idValidation = [uuidParam()];

const filterValidation = [
  optionalUuidQuery('fromAccountId'),
  optionalUuidQuery('toAccountId'),
  optionalDateQuery('dateFrom'),
  optionalDateQuery('dateTo'),
  optionalNumberQuery('fromAmountFrom'),
  optionalNumberQuery('fromAmountTo'),
  optionalNumberQuery('toAmountFrom'),
  optionalNumberQuery('toAmountTo'),
  query('descriptionContains').optional().isString().isLength({ max: 500 }),
];

export const getPagedValidation = [...pageQueryValidation, ...filterValidation];

export const countValidation = filterValidation;

export const createValidation = [
  body('date').isISO8601().withMessage('date must be an ISO 8601 date'),
  body('fromAccountId').isUUID().withMessage('fromAccountId must be a valid UUID'),
  body('toAccountId').isUUID().withMessage('toAccountId must be a valid UUID'),
  body('fromAmount').isFloat().withMessage('fromAmount must be a number').toFloat(),
  body('toAmount').isFloat().withMessage('toAmount must be a number').toFloat(),
  body('description').optional().isString().isLength({ max: 500 }),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('date').optional().isISO8601().withMessage('date must be an ISO 8601 date'),
  body('fromAccountId').optional().isUUID().withMessage('fromAccountId must be a valid UUID'),
  body('toAccountId').optional().isUUID().withMessage('toAccountId must be a valid UUID'),
  body('fromAmount').optional().isFloat().withMessage('fromAmount must be a number').toFloat(),
  body('toAmount').optional().isFloat().withMessage('toAmount must be a number').toFloat(),
  body('description').optional().isString().isLength({ max: 500 }),
];
