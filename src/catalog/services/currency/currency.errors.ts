import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Currency';

export class CurrencyErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('currency-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.CURRENCY_NOT_FOUND, ENTITY_NAME, id);
  }

  nameIsRequired(): DomainError {
    return this.requiredError(ErrorCode.CURRENCY_NAME_REQUIRED, ENTITY_NAME, 'Name');
  }

  charCodeIsRequired(): DomainError {
    return this.requiredError(ErrorCode.CURRENCY_CHARCODE_REQUIRED, ENTITY_NAME, 'CharCode');
  }

  numCodeIsRequired(): DomainError {
    return this.requiredError(ErrorCode.CURRENCY_NUMCODE_REQUIRED, ENTITY_NAME, 'NumCode');
  }

  charCodeAlreadyExists(charCode: string): DomainError {
    return this.alreadyExistsError(ErrorCode.CURRENCY_CHARCODE_EXISTS, ENTITY_NAME, 'CharCode', charCode);
  }

  numCodeAlreadyExists(numCode: string): DomainError {
    return this.alreadyExistsError(ErrorCode.CURRENCY_NUMCODE_EXISTS, ENTITY_NAME, 'NumCode', numCode);
  }

  cannotDeleteUsed(id: string): DomainError {
    return this.usedEntityError(ErrorCode.CURRENCY_IN_USE, ENTITY_NAME, id);
  }
}
