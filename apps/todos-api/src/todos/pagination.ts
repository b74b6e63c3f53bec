import { PageRequest } from '@todos/common/types';

export const DEFAULT_PAGE_SIZE = 20;

// Keeps OFFSET a safe integer that Postgres accepts as bigint
export const MAX_PAGE = 1_000_000;

export function pageWindow({ page, perPage }: PageRequest): { limit: number; offset: number } {
  return { limit: perPage, offset: (page - 1) * perPage };
}
