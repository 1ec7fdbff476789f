import { Request } from 'express';

import { PageFilter } from '../pagination';

type Query = Request['query'];

const first = (value: Query[string]): string | undefined => {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
};

export const readString = (query: Query, name: string): string | undefined => {
  const value = first(query[name]);
  return value === undefined || value === '' ? undefined : value;
};

export const readNumber = (query: Query, name: string): number | undefined => {
  const value = readString(query, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

export const readInt = (query: Query, name: string): number | undefined => {
  const parsed = readNumber(query, name);
  return parsed === undefined ? undefined : Math.trunc(parsed);
};

export const readBool = (query: Query, name: string): boolean | undefined => {
  const value = readString(query, name)?.toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
};

export const readDate = (query: Query, name: string): Date | undefined => {
  const value = readString(query, name);
  if (value === undefined) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

/**
 * `Page` and `ItemsPerPage` query parameters
 */
export const readPageFilter = (query: Query): PageFilter => ({
  page: readInt(query, 'Page'),
  itemsPerPage: readInt(query, 'ItemsPerPage'),
});
