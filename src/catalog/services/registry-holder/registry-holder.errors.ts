import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Registry holder';

export class RegistryHolderErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('registry-holder-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.REGISTRYHOLDER_NOT_FOUND, ENTITY_NAME, id);
  }

  telegramIdIsRequired(): DomainError {
    return this.requiredError(ErrorCode.REGISTRYHOLDER_TELEGRAMID_REQUIRED, ENTITY_NAME, 'TelegramId');
  }

  telegramIdAlreadyExists(telegramId: number): DomainError {
    return this.alreadyExistsError(ErrorCode.REGISTRYHOLDER_TELEGRAMID_EXISTS, ENTITY_NAME, 'TelegramId', telegramId);
  }

  cannotDeleteUsed(id: string): DomainError {
    return this.usedEntityError(ErrorCode.REGISTRYHOLDER_IN_USE, ENTITY_NAME, id);
  }
}
