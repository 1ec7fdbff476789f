import { body, param, query } from 'express-validator';

import { optionalBooleanQuery, pageQueryValidation, uuidParam } from '../../../common/http/validation';

export const idValidation = [uuidParam()];

export const getPagedValidation = [
  ...pageQueryValidation,
  query('codeContains').optional().isString().isLength({ max: 50 }),
  query('descriptionContains').optional().isString(),
  optionalBooleanQuery('includeDeleted'),
];

export const existsByCodeValidation = [
  param('code').isString().isLength({ min: 1, max: 50 }).withMessage('code must be 1-50 characters'),
];

export const createValidation = [
  body('code').isString().withMessage('code must be a string').isLength({ max: 50 }),
  body('description').optional().isString(),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('code').optional().isString().isLength({ max: 50 }),
  body('description').optional().isString(),
];
