import { body, query } from 'express-validator';

import { pageQueryValidation, uuidParam } from '../../../common/http/validation';

export const getByIdValidation = [uuidParam()];

export const getPagedValidation = [
  ...pageQueryValidation,
  query('nameContains').optional().isString().isLength({ max: 100 }),
];

export const createValidation = [
  body('name')
    .isString()
    .withMessage('name must be a string')
    .isLength({ max: 100 })
    .withMessage('name must be at most 100 characters'),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('name')
    .optional()
    .isString()
    .withMessage('name must be a string')
    .isLength({ max: 100 })
    .withMessage('name must be at most 100 characters'),
];

export const deleteValidation = [uuidParam()];
