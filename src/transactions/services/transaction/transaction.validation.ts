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
  optionalDateQuery('dateFrom'),
  optionalDateQuery('dateTo'),
  optionalUuidQuery('accountId'),
  optionalUuidQuery('categoryId'),
  optionalNumberQuery('amountFrom'),
  optionalNumberQuery('amountTo'),
  query('descriptionContains').optional().isString().isLength({ max: 500 }),
];

export const getPagedValidation = [...pageQueryValidation, ...filterValidation];

export const countValidation = filterValidation;

export const createValidation = [
  body('date').isISO8601().withMessage('date must be an ISO 8601 date'),
  body('accountId').isUUID().withMessage('accountId must be a valid UUID'),
  body('categoryId').isUUID().withMessage('categoryId must be a valid UUID'),
  body('amount').isFloat().withMessage('amount must be a number').toFloat(),
  body('description').optional().isString().isLength({ max: 500 }),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('date').optional().isISO8601().withMessage('date must be an ISO 8601 date'),
  body('accountId').optional().isUUID().withMessage('accountId must be a valid UUID'),
  body('categoryId').optional().isUUID().withMessage('categoryId must be a valid UUID'),
  body('amount').optional().isFloat().withMessage('amount must be a number').toFloat(),
  body('description').optional().isString().isLength({ max: 500 }),
];
