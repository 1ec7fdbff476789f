import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Transfer';

export class TransferErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('transfer-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.TRANSFER_NOT_FOUND, ENTITY_NAME, id);
  }

  invalidAmount(): DomainError {
    return this.validationError(ErrorCode.TRANSFER_INVALID_AMOUNT, 'Transfer amounts must not be zero.');
  }

  accountNotFound(accountId: string): DomainError {
    return this.customNotFoundError(ErrorCode.TRANSFER_ACCOUNT_NOT_FOUND, `Account with id '${accountId}' not found.`);
  }

  accountIsSoftDeleted(accountId: string): DomainError {
    return this.validationError(
      ErrorCode.TRANSFER_ACCOUNT_SOFT_DELETED,
      `Account '${accountId}' is deleted and cannot be used for transfers.`
    );
  }

  accountIsArchived(accountId: string): DomainError {
    return this.validationError(
      ErrorCode.TRANSFER_ACCOUNT_ARCHIVED,
      `Account '${accountId}' is archived and cannot be used for transfers.`
    );
  }

  sameAccount(accountId: string): DomainError {
    return this.validationError(
      ErrorCode.TRANSFER_SAME_ACCOUNT,
      `Cannot transfer from account '${accountId}' to itself.`
    );
  }
}
