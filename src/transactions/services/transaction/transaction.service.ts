import { v4 as uuid } from 'uuid';
import { Logger } from 'pino';

import { parseDateTime } from '../../../common/dates';
import { requireArgument } from '../../../common/exceptions';
import { done, fail, ok, Result } from '../../../common/result';
import { UnitOfWork } from '../../../common/persistence/unit-of-work';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError } from '../../../types/errors';
import { ITransactionsAccount, ITransactionsCategory } from '../../models';
import { ReferenceRepository, TransactionsAccount, TransactionsCategory } from '../reference';
import { TransactionErrorsFactory } from './transaction.errors';
import { TransactionRepository } from './transaction.repository';
import { CreateTransactionDto, Transaction, TransactionFilter, UpdateTransactionDto } from './transaction.types';

export interface TransactionReferences {
  accounts: ReferenceRepository<TransactionsAccount, ITransactionsAccount>;
  categories: ReferenceRepository<TransactionsCategory, ITransactionsCategory>;
}

export class TransactionService {
  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly transactions: TransactionRepository,
    private readonly references: TransactionReferences,
    private readonly errors: TransactionErrorsFactory,
    private readonly logger: Logger = createServiceLogger('transaction-service')
  ) {}

  async getById(id: string, signal?: AbortSignal): Promise<Result<Transaction>> {
    const transaction = await this.transactions.getById(id, { disableTracking: true, signal });
    return transaction ? ok(transaction) : fail(this.errors.notFound(id));
  }

  async getPaged(filter: TransactionFilter, signal?: AbortSignal): Promise<Result<Transaction[]>> {
    return ok(await this.transactions.getPaged(filter, { signal }));
  }

  async count(filter: TransactionFilter, signal?: AbortSignal): Promise<Result<number>> {
    return ok(await this.transactions.count(filter, signal));
  }

  async create(dto: CreateTransactionDto, signal?: AbortSignal): Promise<Result<Transaction>> {
    if (!dto.amount) {
      return fail(this.errors.invalidAmount());
    }

    const referenceError =
      (await this.checkAccount(dto.accountId, signal)) ?? (await this.checkCategory(dto.categoryId, signal));
    if (referenceError) {
      return fail(referenceError);
    }

    const transaction = this.transactions.add({
      id: uuid(),
      date: requireArgument(parseDateTime(dto.date), 'date'),
      accountId: dto.accountId,
      categoryId: dto.categoryId,
      amount: dto.amount,
      description: dto.description ?? '',
      createdAt: new Date(),
    });
    await this.unitOfWork.commit(signal);

    this.logger.info(
      { transactionId: transaction.id, accountId: transaction.accountId, amount: transaction.amount },
      'Transaction created'
    );
    return ok(transaction);
  }

  async update(dto: UpdateTransactionDto, signal?: AbortSignal): Promise<Result<Transaction>> {
    const transaction = await this.transactions.getById(dto.id, { signal });
    if (!transaction) {
      return fail(this.errors.notFound(dto.id));
    }

    if (dto.amount !== undefined && dto.amount !== transaction.amount) {
      if (!dto.amount) return fail(this.errors.invalidAmount());
      transaction.amount = dto.amount;
    }
    if (dto.accountId !== undefined && dto.accountId !== transaction.accountId) {
      const error = await this.checkAccount(dto.accountId, signal);
      if (error) return fail(error);
      transaction.accountId = dto.accountId;
    }
    if (dto.categoryId !== undefined && dto.categoryId !== transaction.categoryId) {
      const error = await this.checkCategory(dto.categoryId, signal);
      if (error) return fail(error);
      transaction.categoryId = dto.categoryId;
    }
    if (dto.date !== undefined) {
      transaction.date = requireArgument(parseDateTime(dto.date), 'date');
    }
    if (dto.description !== undefined) {
      transaction.description = dto.description;
    }

    if (this.unitOfWork.hasChanges()) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ transactionId: transaction.id }, 'Transaction updated');
    }
    return ok(transaction);
  }

  async delete(id: string, signal?: AbortSignal): Promise<Result> {
    if (await this.transactions.deleteById(id, signal)) {
      await this.unitOfWork.commit(signal);
      this.logger.info({ transactionId: id }, 'Transaction deleted');
    }
    return done();
  }

  private async checkAccount(id: string, signal?: AbortSignal): Promise<DomainError | undefined> {
    const account = await this.references.accounts.getById(id, { disableTracking: true, signal });
    if (!account) return this.errors.accountNotFound(id);
    if (account.isDeleted) return this.errors.accountIsSoftDeleted(id);
    if (account.isArchived) return this.errors.accountIsArchived(id);
    return undefined;
  }

  private async checkCategory(id: string, signal?: AbortSignal): Promise<DomainError | undefined> {
    const category = await this.references.categories.getById(id, { disableTracking: true, signal });
    if (!category) return this.errors.categoryNotFound(id);
    if (category.isDeleted) return this.errors.categoryIsSoftDeleted(id);
    return undefined;
  }
}
