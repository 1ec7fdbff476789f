import { Logger } from 'pino';

import { formatIsoDate } from '../../../common/dates';
import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Exchange rate';

export class ExchangeRateErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('exchange-rate-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.EXCHANGERATE_NOT_FOUND, ENTITY_NAME, id);
  }

  currencyIsRequired(): DomainError {
    return this.requiredError(ErrorCode.EXCHANGERATE_CURRENCY_REQUIRED, ENTITY_NAME, 'CurrencyId');
  }

  currencyNotFound(currencyId: string): DomainError {
    return this.customNotFoundError(
      ErrorCode.EXCHANGERATE_CURRENCY_NOT_FOUND,
      `Currency with id '${currencyId}' not found.`
    );
  }

  rateDateIsRequired(): DomainError {
    return this.requiredError(ErrorCode.EXCHANGERATE_RATEDATE_REQUIRED, ENTITY_NAME, 'RateDate');
  }

  rateValueIsRequired(): DomainError {
    return this.requiredError(ErrorCode.EXCHANGERATE_VALUE_REQUIRED, ENTITY_NAME, 'Rate');
  }

  alreadyExists(currencyId: string, rateDate: Date): DomainError {
    return this.alreadyExistsError(
      ErrorCode.EXCHANGERATE_EXISTS,
      ENTITY_NAME,
      'CurrencyId:RateDate',
      `${currencyId}:${formatIsoDate(rateDate)}`
    );
  }
}
