import { body, query } from 'express-validator';

import {
  optionalBooleanQuery,
  optionalUuidQuery,
  pageQueryValidation,
  uuidParam,
} from '../../../common/http/validation';

export const getByIdValidation = [uuidParam(), optionalBooleanQuery('includeRelated')];

export const getPagedValidation = [
  ...pageQueryValidation,
  optionalUuidQuery('countryId'),
  query('nameContains').optional().isString().isLength({ max: 100 }),
];

export const accountsCountValidation = [
  uuidParam(),
  optionalBooleanQuery('includeArchived'),
  optionalBooleanQuery('includeDeleted'),
];

export const createValidation = [
  body('countryId').isUUID().withMessage('countryId must be a valid UUID'),
  body('name').isString().withMessage('name must be a string').isLength({ max: 100 }),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('countryId').optional().isUUID().withMessage('countryId must be a valid UUID'),
  body('name').optional().isString().withMessage('name must be a string').isLength({ max: 100 }),
];

export const deleteValidation = [uuidParam()];
