import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Country';

export class CountryErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('country-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.COUNTRY_NOT_FOUND, ENTITY_NAME, id);
  }

  nameIsRequired(): DomainError {
    return this.requiredError(ErrorCode.COUNTRY_NAME_REQUIRED, ENTITY_NAME, 'Name');
  }

  nameAlreadyExists(name: string): DomainError {
    return this.alreadyExistsError(ErrorCode.COUNTRY_NAME_EXISTS, ENTITY_NAME, 'Name', name);
  }

  cannotDeleteUsed(id: string): DomainError {
    return this.usedEntityError(ErrorCode.COUNTRY_IN_USE, ENTITY_NAME, id);
  }
}
