import { body, query } from 'express-validator';

import {
  optionalBooleanQuery,
  optionalNumberQuery,
  optionalUuidQuery,
  pageQueryValidation,
  uuidParam,
} from '../../../common/http/validation';

export const idValidation = [uuidParam()];

export const getPagedValidation = [
  ...pageQueryValidation,
  optionalUuidQuery('registryHolderId'),
  optionalUuidQuery('accountTypeId'),
  optionalUuidQuery('currencyId'),
  optionalUuidQuery('bankId'),
  query('nameContains').optional().isString().isLength({ max: 100 }),
  optionalBooleanQuery('isIncludeInBalance'),
  optionalBooleanQuery('isDefault'),
  optionalBooleanQuery('isArchived'),
  optionalBooleanQuery('includeDeleted'),
  optionalNumberQuery('creditLimitFrom'),
  optionalNumberQuery('creditLimitTo'),
];

export const getDefaultValidation = [uuidParam('registryHolderId')];

export const createValidation = [
  body('registryHolderId').isUUID().withMessage('registryHolderId must be a valid UUID'),
  body('accountTypeId').isUUID().withMessage('accountTypeId must be a valid UUID'),
  body('currencyId').isUUID().withMessage('currencyId must be a valid UUID'),
  body('bankId').optional({ values: 'null' }).isUUID().withMessage('bankId must be a valid UUID'),
  body('name').isString().withMessage('name must be a string').isLength({ max: 100 }),
  body('isIncludeInBalance')
    .optional()
    .isBoolean()
    .withMessage('isIncludeInBalance must be a boolean')
    .toBoolean(),
  body('isDefault')
    .optional()
    .isBoolean()
    .withMessage('isDefault must be a boolean')
    .toBoolean(),
  body('creditLimit')
    .optional({ values: 'null' })
    .isFloat()
    .withMessage('creditLimit must be a number')
    .toFloat(),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('accountTypeId').optional().isUUID().withMessage('accountTypeId must be a valid UUID'),
  body('currencyId').optional().isUUID().withMessage('currencyId must be a valid UUID'),
  body('bankId').optional({ values: 'null' }).isUUID().withMessage('bankId must be a valid UUID'),
  body('name').optional().isString().withMessage('name must be a string').isLength({ max: 100 }),
  body('isIncludeInBalance')
    .optional()
    .isBoolean()
    .withMessage('isIncludeInBalance must be a boolean')
    .toBoolean(),
  body('isDefault')
    .optional()
    .isBoolean()
    .withMessage('isDefault must be a boolean')
    .toBoolean(),
  body('isArchived')
    .optional()
    .isBoolean()
    .withMessage('isArchived must be a boolean')
    .toBoolean(),
  body('creditLimit')
    .optional({ values: 'null' })
    .isFloat()
    .withMessage('creditLimit must be a number')
    .toFloat(),
];

export const unsetDefaultValidation = [
  uuidParam(),
  body('replacementDefaultAccountId')
    .isUUID()
    .withMessage('replacementDefaultAccountId must be a valid UUID'),
];
