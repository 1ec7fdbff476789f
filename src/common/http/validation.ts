import { param, query } from 'express-validator';

import { MAX_ITEMS_PER_PAGE } from '../pagination';

/**
 * Validation shared by every paged list endpoint
 */
export const pageQueryValidation = [
  query('Page').optional().isInt({ min: 1 }).withMessage('Page must be a positive integer'),
  query('ItemsPerPage')
    .optional()
    .isInt({ min: 1, max: MAX_ITEMS_PER_PAGE })
    .withMessage(`ItemsPerPage must be between 1 and ${MAX_ITEMS_PER_PAGE}`),
];

export const uuidParam = (name = 'id') =>
  param(name).isUUID().withMessage(`${name} must be a valid UUID`);

export const optionalUuidQuery = (name: string) =>
  query(name).optional().isUUID().withMessage(`${name} must be a valid UUID`);

export const optionalBooleanQuery = (name: string) =>
  query(name).optional().isBoolean().withMessage(`${name} must be true or false`);

export const optionalNumberQuery = (name: string) =>
  query(name).optional().isFloat().withMessage(`${name} must be a number`);

export const optionalDateQuery = (name: string) =>
  query(name).optional().isISO8601().withMessage(`${name} must be an ISO 8601 date`);
