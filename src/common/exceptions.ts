/**
 * Exceptions for programming errors and unreachable states.
 *
 * Business-rule violations never throw; they are returned as DomainError
 * values. These classes are mapped to problem details by the error handler:
 * ArgumentError → 400, InvalidOperationError → 422, anything else → 500.
 */

export class ArgumentError extends Error {
  readonly paramName?: string;

  constructor(message: string, paramName?: string) {
    super(paramName ? `${message} (parameter '${paramName}')` : message);
    this.name = 'ArgumentError';
    this.paramName = paramName;
  }
}

export class InvalidOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

/**
 * Raised by outbound HTTP clients when the remote service is unreachable,
 * answers with an unexpected status or returns a payload of the wrong shape.
 */
export class ExternalApiError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'ExternalApiError';
    this.statusCode = options?.statusCode;
  }
}

export const requireArgument = <T>(value: T | null | undefined, paramName: string): T => {
  if (value === null || value === undefined) {
    throw new ArgumentError('Value cannot be null', paramName);
  }
  return value;
};
