import { HierarchyError } from '@/lib/errors/hierarchy-error';
import { createModuleLogger } from '@/lib/observability/logger';
import {
  GLOBAL_FILTER_KEY,
  HIERARCHY_CATEGORIES,
  type CandidateFilter,
  type FilterKey,
} from './types';

const log = createModuleLogger('hierarchy-filters');

const FILTER_KEYS: ReadonlySet<string> = new Set<string>([...HIERARCHY_CATEGORIES, GLOBAL_FILTER_KEY]);

export function isFilterKey(key: string): key is FilterKey {
  return FILTER_KEYS.has(key);
}

/**
 * Ordered candidate-list filters per hierarchy category, plus the global key
 * that runs once over the composed list.
 *
 * Populate during application startup. Resolution only reads the registry and
 * nothing here is synchronized, so registrations must finish before requests
 * are served.
 */
export class HierarchyFilterRegistry {
  private filters = new Map<FilterKey, CandidateFilter[]>();

  /** Append a filter; returns a function that removes this registration. */
  add(key: FilterKey, filter: CandidateFilter): () => void {
    if (!isFilterKey(key)) {
      throw HierarchyError.unknownFilterKey(key);
    }
    const list = this.filters.get(key) ?? [];
    list.push(filter);
    this.filters.set(key, list);
    log.debug({ key, count: list.length }, 'Registered hierarchy filter');

    return () => {
      const current = this.filters.get(key);
      const index = current?.indexOf(filter) ?? -1;
      if (current && index !== -1) {
        current.splice(index, 1);
      }
    };
  }

  /** Run every filter registered under `key` in registration order. */
  apply(key: FilterKey, candidates: readonly string[]): string[] {
    let result = [...candidates];
    for (const filter of this.filters.get(key) ?? []) {
      const next: unknown = filter(result);
      if (!Array.isArray(next)) {
        throw HierarchyError.invalidFilterResult(key);
      }
      result = next.map(String);
    }
    return result;
  }

  has(key: FilterKey): boolean {
    return this.count(key) > 0;
  }

  count(key: FilterKey): number {
    return this.filters.get(key)?.length ?? 0;
  }

  clear(key?: FilterKey): void {
    if (key === undefined) {
      this.filters.clear();
    } else {
      this.filters.delete(key);
    }
  }
}
