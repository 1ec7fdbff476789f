import { z } from 'zod';

import { Role } from '../../../types/role';

/*
 * Payload shapes served by the catalog API. Unknown properties are dropped;
 * the catalog's registryHolderId becomes holderId on the local copies.
 */

const createdAt = z.coerce.date().optional();

export const catalogHolderSchema = z
  .object({
    id: z.string().uuid(),
    telegramId: z.number().int(),
    role: z.nativeEnum(Role),
    createdAt,
  })
  .transform((holder) => ({
    id: holder.id,
    telegramId: holder.telegramId,
    role: holder.role,
    createdAt: holder.createdAt ?? new Date(),
  }));

export const catalogAccountTypeSchema = z
  .object({
    id: z.string().uuid(),
    code: z.string(),
    description: z.string().nullish(),
    isDeleted: z.boolean().default(false),
    createdAt,
  })
  .transform((accountType) => ({
    id: accountType.id,
    code: accountType.code,
    description: accountType.description ?? '',
    isDeleted: accountType.isDeleted,
    createdAt: accountType.createdAt ?? new Date(),
  }));

export const catalogCurrencySchema = z
  .object({
    id: z.string().uuid(),
    name: z.string(),
    charCode: z.string(),
    numCode: z.string(),
    sign: z.string().nullish(),
    emoji: z.string().nullish(),
    isDeleted: z.boolean().default(false),
    createdAt,
  })
  .transform((currency) => ({
    id: currency.id,
    name: currency.name,
    charCode: currency.charCode,
    numCode: currency.numCode,
    sign: currency.sign ?? '',
    emoji: currency.emoji ?? '',
    isDeleted: currency.isDeleted,
    createdAt: currency.createdAt ?? new Date(),
  }));

export const catalogAccountSchema = z
  .object({
    id: z.string().uuid(),
    registryHolderId: z.string().uuid(),
    accountTypeId: z.string().uuid(),
    currencyId: z.string().uuid(),
    creditLimit: z.number().nullish(),
    isArchived: z.boolean().default(false),
    isDeleted: z.boolean().default(false),
    createdAt,
  })
  .transform((account) => ({
    id: account.id,
    holderId: account.registryHolderId,
    accountTypeId: account.accountTypeId,
    currencyId: account.currencyId,
    creditLimit: account.creditLimit ?? null,
    isArchived: account.isArchived,
    isDeleted: account.isDeleted,
    createdAt: account.createdAt ?? new Date(),
  }));

export const catalogCategorySchema = z
  .object({
    id: z.string().uuid(),
    registryHolderId: z.string().uuid(),
    income: z.boolean().default(false),
    expense: z.boolean().default(false),
    isDeleted: z.boolean().default(false),
    createdAt,
  })
  .transform((category) => ({
    id: category.id,
    holderId: category.registryHolderId,
    income: category.income,
    expense: category.expense,
    isDeleted: category.isDeleted,
    createdAt: category.createdAt ?? new Date(),
  }));

/**
 * `{ success: true, data }` envelope of every catalog response
 */
export const successEnvelope = z.object({
  success: z.literal(true),
  data: z.unknown(),
});
