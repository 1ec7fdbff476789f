import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { parseDateTime } from '../../../common/dates';
import { requireArgument } from '../../../common/exceptions';
import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError } from '../../../types/errors';
import { ITransactionsAccount } from '../../models';
import { ReferenceRepository, TransactionsAccount } from '../reference';
import { TransferErrorsFactory } from './transfer.errors';
import { TransferRepository } from './transfer.repository';
import { CreateTransferDto, Transfer, TransferFilter, UpdateTransferDto } from './transfer.types';

export class TransferService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly transfers: TransferRepository,
    private readonly accounts: ReferenceRepository<TransactionsAccount, ITransactionsAccount>,
    private readonly errors: TransferErrorsFactory,
    private readonly logger: Logger = createServiceLogger('transfer-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<Transfer>> {
    const transfer = await this.transfers.getById(id, { disableTracking: true, signal });
    return transfer ? ok(transfer) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: TransferFilter, signal?: AbortSignal): Promise<Result<Transfer[]>> {
    return ok(await this.transfers.getPaged(filter, { signal }));
  }

  async count(filter: TransferFilter, signal?: AbortSignal): Promise<Result<number>> {
    return ok(await this.transfers.count(filter, signal));
  }

  async create(dto: CreateTransferDto, signal?: AbortSignal): Promise<Result<Transfer>> {
    if (!dto.fromAmount || !dto.toAmount) {
      return fail(this.errors.invalidAmount());
    }
    if (dto.fromAccountId === dto.toAccountId) {
      return fail(this.errors.sameAccount(dto.fromAccountId));
    }

    const accountError =
      (await this.checkAccount(dto.fromAccountId, signal)) ?? (await this.checkAccount(dto.toAccountId, signal));
    if (accountError) {
      return fail(accountError);
    }

    const transfer = this.transfers.add({
      id: uuid(),
      date: requireArgument(parseDateTime(dto.date), 'date'),
      fromAccountId: dto.fromAccountId,
      toAccountId: dto.toAccountId,
      fromAmount: dto.fromAmount,
      toAmount: dto.toAmount,
      description: dto.description ?? '',
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info(
      { transferId: transfer.id, fromAccountId: transfer.fromAccountId, toAccountId: transfer.toAccountId },
      'Transfer created'
    );
    return ok(transfer);
  }

  async update(dto: UpdateTransferDto, signal?: AbortSignal): Promise<Result<Transfer>> {
    const transfer = await this.transfers.getById(dto.id, { signal });
    if (!transfer) {
      return fail(this.errors.notFound(dto.id));
    }

    const fromAccountId = dto.fromAccountId ?? transfer.fromAccountId;
    const toAccountId = dto.toAccountId ?? transfer.toAccountId;
    if (fromAccountId === toAccountId) {
      return fail(this.errors.sameAccount(fromAccountId));
    }
    if (dto.fromAmount !== undefined && !dto.fromAmount) {
      return fail(this.errors.invalidAmount());
    }
    if (dto.toAmount !== undefined && !dto.toAmount) {
      return fail(this.errors.invalidAmount());
    }

    if (fromAccountId !== transfer.fromAccountId) {
      const error = await this.checkAccount(fromAccountId, signal);
      if (error) return fail(error);
      transfer.fromAccountId = fromAccountId;
    }
    if (toAccountId !== transfer.toAccountId) {
      const error = await this.checkAccount(toAccountId, signal);
      if (error) return fail(error);
      transfer.toAccountId = toAccountId;
    }
    if (dto.fromAmount !== undefined) transfer.fromAmount = dto.fromAmount;
    if (dto.toAmount !== undefined) transfer.toAmount = dto.toAmount;
    if (dto.date !== undefined) {
      transfer.date = requireArgument(parseDateTime(dto.date), 'date');
    }
    if (dto.description !== undefined) transfer.description = dto.description;

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ transferId: transfer.id }, 'Transfer updated');
    }
    return ok(transfer);
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    if (await this.transfers.deleteById(id, signal)) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ transferId: id }, 'Transfer deleted');
    }
    return done();
  }

  private async checkAccount(id: string, signal?: AbortSignal): Promise<DomainError | undefined> {
    const account = await this.accounts.getById(id, { disableTracking: true, signal });
    if (!account) return this.errors.accountNotFound(id);
    if (account.isDeleted) return this.errors.accountIsSoftDeleted(id);
    if (account.isArchived) return this.errors.accountIsArchived(id);
    return undefined;
  }
}
