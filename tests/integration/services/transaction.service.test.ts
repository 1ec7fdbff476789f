/**
 * Transaction and Transfer Service Integration Tests
 */

import { Transaction } from '../../../src/transactions/services/transaction';
import { Transfer } from '../../../src/transactions/services/transfer';
import { ErrorCode } from '../../../src/types/errors';
import {
  createdAt,
  createInMemoryTransactionsCollections,
  ids,
  InMemoryTransactionsCollections,
  replicaAccount,
  replicaCategory,
  transactionsScope,
} from '../../helpers';

const transactionId = 'a0a0a0a0-a0a0-4a0a-8a0a-a0a0a0a0a0a1';
const transferId = 'f0f0f0f0-f0f0-4f0f-8f0f-f0f0f0f0f0f1';

const transaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  id: transactionId,
  date: new Date('2024-02-10T09:30:00.000Z'),
  accountId: ids.account,
  categoryId: ids.category,
  amount: -25.5,
  description: 'Lunch',
  createdAt: createdAt(10),
  ...overrides,
});

const transfer = (overrides: Partial<Transfer> = {}): Transfer => ({
  id: transferId,
  date: new Date('2024-02-11T00:00:00.000Z'),
  fromAccountId: ids.account,
  toAccountId: ids.otherAccount,
  fromAmount: 100,
  toAmount: 92,
  description: 'Top up',
  createdAt: createdAt(10),
  ...overrides,
});

describe('Transaction Service Integration Tests', () => {
  let collections: InMemoryTransactionsCollections;
  const scope = () => transactionsScope(collections);

  beforeEach(() => {
    collections = createInMemoryTransactionsCollections();
    collections.accounts.seed(replicaAccount(), replicaAccount({ id: ids.otherAccount, createdAt: createdAt(2) }));
    collections.categories.seed(replicaCategory());
  });

  describe('Transactions', () => {
    const dto = {
      date: '2024-02-10T09:30:00Z',
      accountId: ids.account,
      categoryId: ids.category,
      amount: -12,
    };

    it('should create a transaction against replicated references', async () => {
      const result = await scope().transactionService.create(dto);

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value).toMatchObject({
        date: new Date('2024-02-10T09:30:00.000Z'),
        amount: -12,
        description: '',
      });
      expect(collections.transactions.size).toBe(1);
    });

    it('should reject a zero amount', async () => {
      const result = await scope().transactionService.create({ ...dto, amount: 0 });

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({
          code: ErrorCode.TRANSACTION_INVALID_AMOUNT,
          statusCode: 400,
          message: 'Transaction amount must not be zero.',
        }),
      });
    });

    it('should reject an account that has not been replicated', async () => {
      const result = await scope().transactionService.create({ ...dto, accountId: ids.missing });

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({
          code: ErrorCode.TRANSACTION_ACCOUNT_NOT_FOUND,
          statusCode: 404,
          message: `Account with id '${ids.missing}' not found.`,
        }),
      });
    });

    it('should reject archived accounts and deleted categories', async () => {
      await collections.accounts.replace(replicaAccount({ isArchived: true }));
      await collections.categories.replace(replicaCategory({ isDeleted: true }));

      const archived = await scope().transactionService.create(dto);
      const deletedCategory = await scope().transactionService.create({ ...dto, accountId: ids.otherAccount });

      expect(!archived.ok && archived.error.message).toBe(
        `Account '${ids.account}' is archived and cannot be used for transactions.`
      );
      expect(!deletedCategory.ok && deletedCategory.error.code).toBe(ErrorCode.TRANSACTION_CATEGORY_SOFT_DELETED);
    });

    it('should filter and count transactions', async () => {
      collections.transactions.seed(
        transaction(),
        transaction({ id: ids.missing, amount: 1500, description: 'Salary', createdAt: createdAt(11) })
      );

      const expenses = await scope().transactionService.getPaged({ amountTo: 0 });
      const salary = await scope().transactionService.count({ descriptionContains: 'sal' });

      expect(expenses.ok && expenses.value.map((item) => item.description)).toEqual(['Lunch']);
      expect(salary).toEqual({ ok: true, value: 1 });
    });

    it('should update only the changed fields', async () => {
      collections.transactions.seed(transaction());

      const result = await scope().transactionService.update({ id: transactionId, amount: -30, accountId: ids.otherAccount });

      expect(result.ok).toBe(true);
      expect(collections.transactions.all()[0]).toMatchObject({
        amount: -30,
        accountId: ids.otherAccount,
        categoryId: ids.category,
        description: 'Lunch',
      });
    });

    it('should report a missing transaction on update and ignore it on delete', async () => {
      const updated = await scope().transactionService.update({ id: ids.missing, amount: 1 });
      const deleted = await scope().transactionService.delete(ids.missing);

      expect(!updated.ok && updated.error.message).toBe(`Transaction with id '${ids.missing}' not found.`);
      expect(deleted).toEqual({ ok: true, value: undefined });
    });
  });

  describe('Transfers', () => {
    const dto = {
      date: '2024-02-11',
      fromAccountId: ids.account,
      toAccountId: ids.otherAccount,
      fromAmount: 100,
      toAmount: 92,
    };

    it('should create a transfer between two accounts', async () => {
      const result = await scope().transferService.create({ ...dto, description: 'Top up' });

      if (!result.ok) throw new Error(result.error.message);
      expect(collections.transfers.all()).toEqual([
        expect.objectContaining({ fromAccountId: ids.account, toAccountId: ids.otherAccount, toAmount: 92 }),
      ]);
    });

    it('should reject a zero amount on either side', async () => {
      const result = await scope().transferService.create({ ...dto, toAmount: 0 });

      expect(!result.ok && result.error.message).toBe('Transfer amounts must not be zero.');
    });

    it('should reject a transfer to the same account', async () => {
      const result = await scope().transferService.create({ ...dto, toAccountId: ids.account });

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({
          code: ErrorCode.TRANSFER_SAME_ACCOUNT,
          statusCode: 400,
          message: `Cannot transfer from account '${ids.account}' to itself.`,
        }),
      });
    });

    it('should check the destination account', async () => {
      await collections.accounts.replace(replicaAccount({ id: ids.otherAccount, isDeleted: true, createdAt: createdAt(2) }));

      const result = await scope().transferService.create(dto);

      expect(!result.ok && result.error.code).toBe(ErrorCode.TRANSFER_ACCOUNT_SOFT_DELETED);
      expect(collections.transfers.size).toBe(0);
    });

    it('should reject an update that makes both sides the same account', async () => {
      collections.transfers.seed(transfer());

      const result = await scope().transferService.update({ id: transferId, toAccountId: ids.account });

      expect(!result.ok && result.error.code).toBe(ErrorCode.TRANSFER_SAME_ACCOUNT);
      expect(collections.transfers.all()[0].toAccountId).toBe(ids.otherAccount);
    });

    it('should swap the accounts of a transfer', async () => {
      collections.transfers.seed(transfer());

      const result = await scope().transferService.update({
        id: transferId,
        fromAccountId: ids.otherAccount,
        toAccountId: ids.account,
      });

      expect(result.ok).toBe(true);
      expect(collections.transfers.all()[0]).toMatchObject({ fromAccountId: ids.otherAccount, toAccountId: ids.account });
    });

    it('should filter transfers by source account', async () => {
      collections.transfers.seed(
        transfer(),
        transfer({ id: ids.missing, fromAccountId: ids.otherAccount, toAccountId: ids.account, createdAt: createdAt(11) })
      );

      const result = await scope().transferService.getPaged({ fromAccountId: ids.otherAccount });

      expect(result.ok && result.value.map((item) => item.id)).toEqual([ids.missing]);
    });
  });
});
