import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Account type';

export class AccountTypeErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('account-type-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.ACCOUNTTYPE_NOT_FOUND, ENTITY_NAME, id);
  }

  codeIsRequired(): DomainError {
    return this.requiredError(ErrorCode.ACCOUNTTYPE_CODE_REQUIRED, ENTITY_NAME, 'Code');
  }

  codeAlreadyExists(code: string): DomainError {
    return this.alreadyExistsError(ErrorCode.ACCOUNTTYPE_CODE_EXISTS, ENTITY_NAME, 'Code', code);
  }

  cannotDeleteUsed(id: string): DomainError {
    return this.usedEntityError(ErrorCode.ACCOUNTTYPE_IN_USE, ENTITY_NAME, id);
  }
}
