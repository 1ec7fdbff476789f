import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Bank';

export class BankErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('bank-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.BANK_NOT_FOUND, ENTITY_NAME, id);
  }

  nameIsRequired(): DomainError {
    return this.requiredError(ErrorCode.BANK_NAME_REQUIRED, ENTITY_NAME, 'Name');
  }

  countryNotFound(countryId: string): DomainError {
    return this.customNotFoundError(ErrorCode.BANK_COUNTRY_NOT_FOUND, `Country with id '${countryId}' not found.`);
  }

  nameAlreadyExists(name: string): DomainError {
    return this.alreadyExistsError(ErrorCode.BANK_NAME_EXISTS, ENTITY_NAME, 'Name', name);
  }

  cannotDeleteUsed(id: string): DomainError {
    return this.usedEntityError(ErrorCode.BANK_IN_USE, ENTITY_NAME, id);
  }
}
