import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Transaction';

export class TransactionErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('transaction-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.TRANSACTION_NOT_FOUND, ENTITY_NAME, id);
  }

  invalidAmount(): DomainError {
    return this.validationError(ErrorCode.TRANSACTION_INVALID_AMOUNT, 'Transaction amount must not be zero.');
  }

  accountNotFound(accountId: string): DomainError {
    return this.customNotFoundError(
      ErrorCode.TRANSACTION_ACCOUNT_NOT_FOUND,
      `Account with id '${accountId}' not found.`
    );
  }

  accountIsSoftDeleted(accountId: string): DomainError {
    return this.validationError(
      ErrorCode.TRANSACTION_ACCOUNT_SOFT_DELETED,
      `Account '${accountId}' is deleted and cannot be used for transactions.`
    );
  }

  accountIsArchived(accountId: string): DomainError {
    return this.validationError(
      ErrorCode.TRANSACTION_ACCOUNT_ARCHIVED,
      `Account '${accountId}' is archived and cannot be used for transactions.`
    );
  }

  categoryNotFound(categoryId: string): DomainError {
    return this.customNotFoundError(
      ErrorCode.TRANSACTION_CATEGORY_NOT_FOUND,
      `Category with id '${categoryId}' not found.`
    );
  }

  categoryIsSoftDeleted(categoryId: string): DomainError {
    return this.validationError(
      ErrorCode.TRANSACTION_CATEGORY_SOFT_DELETED,
      `Category '${categoryId}' is deleted and cannot be used for transactions.`
    );
  }
}
