import { body, query } from 'express-validator';

import { optionalBooleanQuery, pageQueryValidation, uuidParam } from '../../../common/http/validation';

export const idValidation = [uuidParam()];

export const getPagedValidation = [
  ...pageQueryValidation,
  query('nameContains').optional().isString().isLength({ max: 100 }),
  query('charCode').optional().isString().isLength({ max: 3 }),
  query('numCode').optional().isString().isLength({ max: 3 }),
  optionalBooleanQuery('includeDeleted'),
];

export const createValidation = [
  body('name').isString().withMessage('name must be a string').isLength({ max: 100 }),
  body('charCode')
    .isString()
    .withMessage('charCode must be a string')
    .isLength({ max: 3 })
    .withMessage('charCode must be at most 3 characters'),
  body('numCode')
    .isString()
    .withMessage('numCode must be a string')
    .isLength({ max: 3 })
    .withMessage('numCode must be at most 3 characters'),
  body('sign').optional().isString(),
  body('emoji').optional().isString(),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('name').optional().isString().isLength({ max: 100 }),
  body('charCode').optional().isString().isLength({ max: 3 }).withMessage('charCode must be at most 3 characters'),
  body('numCode').optional().isString().isLength({ max: 3 }).withMessage('numCode must be at most 3 characters'),
  body('sign').optional().isString(),
  body('emoji').optional().isString(),
];
