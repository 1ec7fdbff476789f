import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';
import { ReplicationKind } from './replication.types';

export class ReplicationErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('replication-errors')) {
    super(logger);
  }

  externalApiFailed(kind: ReplicationKind, reason: string): DomainError {
    return this.externalApiError(
      ErrorCode.REPLICATION_EXTERNAL_API_FAILED,
      `Failed to replicate ${kind} from the catalog API: ${reason}`
    );
  }
}
