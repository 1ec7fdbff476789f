import { body, query } from 'express-validator';

import { pageQueryValidation, uuidParam } from '../../../common/http/validation';
import { Role } from '../../../types/role';

const roles = Object.values(Role);

export const getByIdValidation = [uuidParam()];

export const getPagedValidation = [
  ...pageQueryValidation,
  query('telegramId').optional().isInt().withMessage('telegramId must be an integer'),
  query('role').optional().isIn(roles).withMessage(`role must be one of: ${roles.join(', ')}`),
];

export const createValidation = [
  body('telegramId')
    .exists({ values: 'null' })
    .withMessage('telegramId is required')
    .isInt()
    .withMessage('telegramId must be an integer')
    .toInt(),
  body('role').optional().isIn(roles).withMessage(`role must be one of: ${roles.join(', ')}`),
];

export const updateValidation = [
  body('id').isUUID().withMessage('id must be a valid UUID'),
  body('telegramId').optional().isInt().withMessage('telegramId must be an integer').toInt(),
  body('role').optional().isIn(roles).withMessage(`role must be one of: ${roles.join(', ')}`),
];

export const deleteValidation = [uuidParam()];
