import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Account';

export class AccountErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('account-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.ACCOUNT_NOT_FOUND, ENTITY_NAME, id);
  }

  nameIsRequired(): DomainError {
    return this.requiredError(ErrorCode.ACCOUNT_NAME_REQUIRED, ENTITY_NAME, 'Name');
  }

  registryHolderNotFound(id: string): DomainError {
    return this.customNotFoundError(ErrorCode.ACCOUNT_REGISTRYHOLDER_NOT_FOUND, `Registry holder with id '${id}' not found.`);
  }

  accountTypeNotFound(id: string): DomainError {
    return this.customNotFoundError(ErrorCode.ACCOUNT_ACCOUNTTYPE_NOT_FOUND, `Account type with id '${id}' not found.`);
  }

  accountTypeIsSoftDeleted(id: string): DomainError {
    return this.validationError(ErrorCode.ACCOUNT_ACCOUNTTYPE_SOFT_DELETED, `Account type '${id}' is deleted.`);
  }

  currencyNotFound(id: string): DomainError {
    return this.customNotFoundError(ErrorCode.ACCOUNT_CURRENCY_NOT_FOUND, `Currency with id '${id}' not found.`);
  }

  currencyIsSoftDeleted(id: string): DomainError {
    return this.validationError(ErrorCode.ACCOUNT_CURRENCY_SOFT_DELETED, `Currency '${id}' is deleted.`);
  }

  bankNotFound(id: string): DomainError {
    return this.customNotFoundError(ErrorCode.ACCOUNT_BANK_NOT_FOUND, `Bank with id '${id}' not found.`);
  }

  defaultAccountNotFound(registryHolderId: string): DomainError {
    return this.customNotFoundError(
      ErrorCode.ACCOUNT_DEFAULT_NOT_FOUND,
      `Default account for registry holder '${registryHolderId}' not found.`
    );
  }

  cannotArchiveDefault(id: string): DomainError {
    return this.conflictError(ErrorCode.ACCOUNT_CANNOT_ARCHIVE_DEFAULT, `Default account '${id}' cannot be archived or deleted.`);
  }

  cannotSoftDeleteDefault(id: string): DomainError {
    return this.conflictError(ErrorCode.ACCOUNT_CANNOT_SOFT_DELETE_DEFAULT, `Default account '${id}' cannot be soft-deleted.`);
  }

  cannotDeleteDefault(id: string): DomainError {
    return this.conflictError(ErrorCode.ACCOUNT_CANNOT_DELETE_DEFAULT, `Default account '${id}' cannot be deleted.`);
  }

  cannotBeDefaultIfArchivedOrDeleted(id: string): DomainError {
    return this.conflictError(
      ErrorCode.ACCOUNT_CANNOT_BE_DEFAULT_IF_ARCHIVED_OR_DELETED,
      `Archived or deleted account '${id}' cannot be set as default.`
    );
  }

  unsetDefaultRequiresReplacement(id: string): DomainError {
    return this.conflictError(
      ErrorCode.ACCOUNT_UNSET_DEFAULT_REQUIRES_REPLACEMENT,
      `Default flag of account '${id}' can only be removed by nominating a replacement default account.`
    );
  }

  replacementDefaultNotFound(id: string): DomainError {
    return this.customNotFoundError(
      ErrorCode.ACCOUNT_REPLACEMENT_DEFAULT_NOT_FOUND,
      `Replacement default account with id '${id}' not found.`
    );
  }

  replacementCannotBeDefault(id: string): DomainError {
    return this.conflictError(
      ErrorCode.ACCOUNT_REPLACEMENT_CANNOT_BE_DEFAULT,
      `Replacement account '${id}' is archived or deleted and cannot be set as default.`
    );
  }

  registryHolderDiffers(id: string, replacementId: string): DomainError {
    return this.conflictError(
      ErrorCode.ACCOUNT_REGISTRYHOLDER_DIFFERS,
      `Accounts '${id}' and '${replacementId}' belong to different registry holders.`
    );
  }
}
