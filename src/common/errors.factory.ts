import { Logger } from 'pino';

import { DomainError, ErrorCode, ErrorKind } from '../types/errors';

/**
 * Base class of the per-entity error factories.
 *
 * Each factory method builds a DomainError with a stable code, an HTTP status
 * and a message, logs it at warn level and returns it to the caller.
 */
export abstract class ErrorsFactory {
  protected constructor(protected readonly logger: Logger) {}

  protected notFoundError(code: ErrorCode, entityName: string, id: string): DomainError {
    return this.create(ErrorKind.NotFound, code, 404, `${entityName} with id '${id}' not found.`);
  }

  protected alreadyExistsError(
    code: ErrorCode,
    entityName: string,
    propertyName: string,
    value: string | number
  ): DomainError {
    return this.create(
      ErrorKind.AlreadyExists,
      code,
      409,
      `${entityName} with ${propertyName} '${value}' already exists.`
    );
  }

  protected requiredError(code: ErrorCode, entityName: string, propertyName: string): DomainError {
    return this.create(ErrorKind.Required, code, 400, `${entityName} ${propertyName} can't be empty.`);
  }

  protected usedEntityError(code: ErrorCode, entityName: string, id: string): DomainError {
    return this.create(
      ErrorKind.InUse,
      code,
      409,
      `Cannot delete ${entityName.toLowerCase()} '${id}' because it is used in other entities`
    );
  }

  protected conflictError(code: ErrorCode, message: string): DomainError {
    return this.create(ErrorKind.Conflict, code, 409, message);
  }

  protected customNotFoundError(code: ErrorCode, message: string): DomainError {
    return this.create(ErrorKind.NotFound, code, 404, message);
  }

  protected validationError(code: ErrorCode, message: string): DomainError {
    return this.create(ErrorKind.Validation, code, 400, message);
  }

  protected externalApiError(code: ErrorCode, message: string): DomainError {
    return this.create(ErrorKind.ExternalApi, code, 502, message);
  }

  private create(kind: ErrorKind, code: ErrorCode, statusCode: number, message: string): DomainError {
    this.logger.warn({ code, statusCode }, message);
    return { kind, code, statusCode, message };
  }
}
