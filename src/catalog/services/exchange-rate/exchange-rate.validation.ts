import { body, query } from 'express-validator';

import {
  optionalDateQuery,
  optionalNumberQuery,
  optionalUuidQuery,
  pageQueryValidation,
  uuidParam,
} from '../../../common/http/validation';

export const idValidation = [uuidParam()];

export const getPagedValidation = [
  ...pageQueryValidation,
  optionalUuidQuery('currencyId'),
  optionalDateQuery('dateFrom'),
  optionalDateQuery('dateTo'),
  optionalNumberQuery('rateFrom'),
  optionalNumberQuery('rateTo'),
];

export const createValidation = [
  body('currencyId').isUUID().withMessage('currencyId must be a valid UUID'),
  body('rateDate').isISO8601().withMessage('rateDate must be an ISO 8601 date'),
  body('rate').isFloat().withMessage('rate must be a number').toFloat(),
];

export const addRangeValidation = [
  body().isArray({ min: 1 }).withMessage('body must be a non-empty array of exchange rates'),
  body('*.currencyId').isUUID().withMessage('currencyId must be a valid UUID'),
  body('*.rateDate').isISO8601().withMessage('rateDate must be an ISO 8601 date'),
  body('*.rate').isFloat().withMessage('rate must be a number').toFloat(),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('rateDate').optional().isISO8601().withMessage('rateDate must be an ISO 8601 date'),
  body('rate').optional().isFloat().withMessage('rate must be a number').toFloat(),
];

export const existsValidation = [
  query('currencyId').isUUID().withMessage('currencyId must be a valid UUID'),
  query('date').isISO8601().withMessage('date must be an ISO 8601 date'),
];

export const lastDateValidation = [uuidParam('currencyId')];

export const deleteByPeriodValidation = [
  query('currencyId').isUUID().withMessage('currencyId must be a valid UUID'),
  query('dateFrom').isISO8601().withMessage('dateFrom must be an ISO 8601 date'),
  query('dateTo').isISO8601().withMessage('dateTo must be an ISO 8601 date'),
];
