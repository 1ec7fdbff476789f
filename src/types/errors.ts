/**
 * Error Codes for the Finance Manager APIs
 *
 * Codes are stable strings clients can branch on. They are grouped by the
 * entity that produces them; the HTTP status travels with each DomainError.
 */

export enum ErrorCode {
  // Request / infrastructure errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  ROUTE_NOT_FOUND = 'ROUTE_NOT_FOUND',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_OPERATION = 'INVALID_OPERATION',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  REQUEST_ABORTED = 'REQUEST_ABORTED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Registry holders
  REGISTRYHOLDER_NOT_FOUND = 'REGISTRYHOLDER_NOT_FOUND',
  REGISTRYHOLDER_TELEGRAMID_REQUIRED = 'REGISTRYHOLDER_TELEGRAMID_REQUIRED',
  REGISTRYHOLDER_TELEGRAMID_EXISTS = 'REGISTRYHOLDER_TELEGRAMID_EXISTS',
  REGISTRYHOLDER_IN_USE = 'REGISTRYHOLDER_IN_USE',

  // Countries
  COUNTRY_NOT_FOUND = 'COUNTRY_NOT_FOUND',
  COUNTRY_NAME_REQUIRED = 'COUNTRY_NAME_REQUIRED',
  COUNTRY_NAME_EXISTS = 'COUNTRY_NAME_EXISTS',
  COUNTRY_IN_USE = 'COUNTRY_IN_USE',

  // Banks
  BANK_NOT_FOUND = 'BANK_NOT_FOUND',
  BANK_NAME_REQUIRED = 'BANK_NAME_REQUIRED',
  BANK_COUNTRY_NOT_FOUND = 'BANK_COUNTRY_NOT_FOUND',
  BANK_NAME_EXISTS = 'BANK_NAME_EXISTS',
  BANK_IN_USE = 'BANK_IN_USE',

  // Currencies
  CURRENCY_NOT_FOUND = 'CURRENCY_NOT_FOUND',
  CURRENCY_NAME_REQUIRED = 'CURRENCY_NAME_REQUIRED',
  CURRENCY_CHARCODE_REQUIRED = 'CURRENCY_CHARCODE_REQUIRED',
  CURRENCY_NUMCODE_REQUIRED = 'CURRENCY_NUMCODE_REQUIRED',
  CURRENCY_CHARCODE_EXISTS = 'CURRENCY_CHARCODE_EXISTS',
  CURRENCY_NUMCODE_EXISTS = 'CURRENCY_NUMCODE_EXISTS',
  CURRENCY_IN_USE = 'CURRENCY_IN_USE',

  // Account types
  ACCOUNTTYPE_NOT_FOUND = 'ACCOUNTTYPE_NOT_FOUND',
  ACCOUNTTYPE_CODE_REQUIRED = 'ACCOUNTTYPE_CODE_REQUIRED',
  ACCOUNTTYPE_CODE_EXISTS = 'ACCOUNTTYPE_CODE_EXISTS',
  ACCOUNTTYPE_IN_USE = 'ACCOUNTTYPE_IN_USE',

  // Categories
  CATEGORY_NOT_FOUND = 'CATEGORY_NOT_FOUND',
  CATEGORY_NAME_REQUIRED = 'CATEGORY_NAME_REQUIRED',
  CATEGORY_NAME_EXISTS = 'CATEGORY_NAME_EXISTS',
  CATEGORY_REGISTRYHOLDER_NOT_FOUND = 'CATEGORY_REGISTRYHOLDER_NOT_FOUND',
  CATEGORY_PARENT_NOT_FOUND = 'CATEGORY_PARENT_NOT_FOUND',
  CATEGORY_PARENT_REGISTRYHOLDER_DIFFERS = 'CATEGORY_PARENT_REGISTRYHOLDER_DIFFERS',
  CATEGORY_RECURSIVE_PARENT = 'CATEGORY_RECURSIVE_PARENT',
  CATEGORY_IN_USE = 'CATEGORY_IN_USE',

  // Accounts
  ACCOUNT_NOT_FOUND = 'ACCOUNT_NOT_FOUND',
  ACCOUNT_NAME_REQUIRED = 'ACCOUNT_NAME_REQUIRED',
  ACCOUNT_REGISTRYHOLDER_NOT_FOUND = 'ACCOUNT_REGISTRYHOLDER_NOT_FOUND',
  ACCOUNT_ACCOUNTTYPE_NOT_FOUND = 'ACCOUNT_ACCOUNTTYPE_NOT_FOUND',
  ACCOUNT_ACCOUNTTYPE_SOFT_DELETED = 'ACCOUNT_ACCOUNTTYPE_SOFT_DELETED',
  ACCOUNT_CURRENCY_NOT_FOUND = 'ACCOUNT_CURRENCY_NOT_FOUND',
  ACCOUNT_CURRENCY_SOFT_DELETED = 'ACCOUNT_CURRENCY_SOFT_DELETED',
  ACCOUNT_BANK_NOT_FOUND = 'ACCOUNT_BANK_NOT_FOUND',
  ACCOUNT_DEFAULT_NOT_FOUND = 'ACCOUNT_DEFAULT_NOT_FOUND',
  ACCOUNT_CANNOT_ARCHIVE_DEFAULT = 'ACCOUNT_CANNOT_ARCHIVE_DEFAULT',
  ACCOUNT_CANNOT_SOFT_DELETE_DEFAULT = 'ACCOUNT_CANNOT_SOFT_DELETE_DEFAULT',
  ACCOUNT_CANNOT_DELETE_DEFAULT = 'ACCOUNT_CANNOT_DELETE_DEFAULT',
  ACCOUNT_CANNOT_BE_DEFAULT_IF_ARCHIVED_OR_DELETED = 'ACCOUNT_CANNOT_BE_DEFAULT_IF_ARCHIVED_OR_DELETED',
  ACCOUNT_UNSET_DEFAULT_REQUIRES_REPLACEMENT = 'ACCOUNT_UNSET_DEFAULT_REQUIRES_REPLACEMENT',
  ACCOUNT_REPLACEMENT_DEFAULT_NOT_FOUND = 'ACCOUNT_REPLACEMENT_DEFAULT_NOT_FOUND',
  ACCOUNT_REPLACEMENT_CANNOT_BE_DEFAULT = 'ACCOUNT_REPLACEMENT_CANNOT_BE_DEFAULT',
  ACCOUNT_REGISTRYHOLDER_DIFFERS = 'ACCOUNT_REGISTRYHOLDER_DIFFERS',

  // Exchange rates
  EXCHANGERATE_NOT_FOUND = 'EXCHANGERATE_NOT_FOUND',
  EXCHANGERATE_CURRENCY_REQUIRED = 'EXCHANGERATE_CURRENCY_REQUIRED',
  EXCHANGERATE_CURRENCY_NOT_FOUND = 'EXCHANGERATE_CURRENCY_NOT_FOUND',
  EXCHANGERATE_RATEDATE_REQUIRED = 'EXCHANGERATE_RATEDATE_REQUIRED',
  EXCHANGERATE_VALUE_REQUIRED = 'EXCHANGERATE_VALUE_REQUIRED',
  EXCHANGERATE_EXISTS = 'EXCHANGERATE_EXISTS',

  // Transactions
  TRANSACTION_NOT_FOUND = 'TRANSACTION_NOT_FOUND',
  TRANSACTION_INVALID_AMOUNT = 'TRANSACTION_INVALID_AMOUNT',
  TRANSACTION_ACCOUNT_NOT_FOUND = 'TRANSACTION_ACCOUNT_NOT_FOUND',
  TRANSACTION_ACCOUNT_SOFT_DELETED = 'TRANSACTION_ACCOUNT_SOFT_DELETED',
  TRANSACTION_ACCOUNT_ARCHIVED = 'TRANSACTION_ACCOUNT_ARCHIVED',
  TRANSACTION_CATEGORY_NOT_FOUND = 'TRANSACTION_CATEGORY_NOT_FOUND',
  TRANSACTION_CATEGORY_SOFT_DELETED = 'TRANSACTION_CATEGORY_SOFT_DELETED',

  // Transfers
  TRANSFER_NOT_FOUND = 'TRANSFER_NOT_FOUND',
  TRANSFER_INVALID_AMOUNT = 'TRANSFER_INVALID_AMOUNT',
  TRANSFER_ACCOUNT_NOT_FOUND = 'TRANSFER_ACCOUNT_NOT_FOUND',
  TRANSFER_ACCOUNT_SOFT_DELETED = 'TRANSFER_ACCOUNT_SOFT_DELETED',
  TRANSFER_ACCOUNT_ARCHIVED = 'TRANSFER_ACCOUNT_ARCHIVED',
  TRANSFER_SAME_ACCOUNT = 'TRANSFER_SAME_ACCOUNT',

  // Replication
  REPLICATION_EXTERNAL_API_FAILED = 'REPLICATION_EXTERNAL_API_FAILED',
}

/**
 * Failure taxonomy shared by all error factories
 */
export enum ErrorKind {
  NotFound = 'NotFound',
  AlreadyExists = 'AlreadyExists',
  Required = 'Required',
  InUse = 'InUse',
  Conflict = 'Conflict',
  Validation = 'Validation',
  ExternalApi = 'ExternalApi',
}

/**
 * Expected business-rule failure, returned as a value rather than thrown
 */
export interface DomainError {
  kind: ErrorKind;
  code: ErrorCode;
  statusCode: number;
  message: string;
}

/**
 * RFC 9457 problem details body used for every failed response
 */
export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance: string;
  traceId: string;
  code: ErrorCode;
  errors?: Record<string, string[]>;
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}
