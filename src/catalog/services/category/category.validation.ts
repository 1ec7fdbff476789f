import { body, query } from 'express-validator';

import {
  optionalBooleanQuery,
  optionalUuidQuery,
  pageQueryValidation,
  uuidParam,
} from '../../../common/http/validation';

export const idValidation = [uuidParam()];

export const getPagedValidation = [
  ...pageQueryValidation,
  optionalUuidQuery('registryHolderId'),
  optionalUuidQuery('parentId'),
  query('nameContains').optional().isString().isLength({ max: 100 }),
  optionalBooleanQuery('income'),
  optionalBooleanQuery('expense'),
  optionalBooleanQuery('includeDeleted'),
];

export const byRegistryHolderValidation = [uuidParam('registryHolderId')];

export const createValidation = [
  body('registryHolderId').isUUID().withMessage('registryHolderId must be a valid UUID'),
  body('name').isString().withMessage('name must be a string').isLength({ max: 100 }),
  body('income').optional().isBoolean().withMessage('income must be a boolean').toBoolean(),
  body('expense').optional().isBoolean().withMessage('expense must be a boolean').toBoolean(),
  body('emoji').optional().isString(),
  body('icon').optional().isString(),
  body('parentId').optional({ values: 'null' }).isUUID().withMessage('parentId must be a valid UUID'),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('name').optional().isString().isLength({ max: 100 }),
  body('income').optional().isBoolean().withMessage('income must be a boolean').toBoolean(),
  body('expense').optional().isBoolean().withMessage('expense must be a boolean').toBoolean(),
  body('emoji').optional().isString(),
  body('icon').optional().isString(),
  body('parentId').optional({ values: 'null' }).isUUID().withMessage('parentId must be a valid UUID'),
];
