// Process-lifetime memoization of fetch + normalize, keyed by the full query
// (agency code, upstream filters, page cap). Concurrent identical calls share
// one request; a rejected call is evicted so retrying queries again.

import { createLogger } from "@/lib/logger";
import type { ContractFilters, ContractRecord } from "@/types/contrato";

const log = createLogger("cache");

export interface QueryKey {
  agencyCode: string;
  filters: ContractFilters;
  pageLimit: number;
}

export interface QueryCache {
  get: (
    key: QueryKey,
    load: () => Promise<ContractRecord[]>,
  ) => Promise<readonly ContractRecord[]>;
  clear: () => void;
  readonly size: number;
}

/** Same key for queries that send the same request upstream. */
export function cacheKey({ agencyCode, filters, pageLimit }: QueryKey): string {
  const normalizedFilters: [string, string | number][] = [];
  if (filters.supplierTaxId?.trim()) {
    normalizedFilters.push(["supplierTaxId", filters.supplierTaxId.replace(/\D/g, "")]);
  }
  if (filters.validityStartFrom?.trim()) {
    normalizedFilters.push(["validityStartFrom", filters.validityStartFrom.trim()]);
  }
  if (filters.validityEndTo?.trim()) {
    normalizedFilters.push(["validityEndTo", filters.validityEndTo.trim()]);
  }
  if (filters.minValue !== undefined) normalizedFilters.push(["minValue", filters.minValue]);

  return JSON.stringify([agencyCode.trim(), normalizedFilters, pageLimit]);
}

export function createQueryCache(): QueryCache {
  const entries = new Map<string, Promise<ContractRecord[]>>();

  return {
    get(key, load) {
      const k = cacheKey(key);
      const hit = entries.get(k);
      if (hit) {
        log.debug(`cache hit ${k}`);
        return hit;
      }

      const pending = load();
      entries.set(k, pending);
      pending.catch(() => {
        entries.delete(k);
      });
      return pending;
    },
    clear() {
      entries.clear();
    },
    get size() {
      return entries.size;
    },
  };
}
