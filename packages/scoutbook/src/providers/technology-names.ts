/**
 * Technology name cache
 *
 * Process-wide read-only table of type id -> display name, fetched once on
 * first use. Injected where needed; tests pass a fixed loader.
 */

import type { TechnologyNameFeed } from './types.js';

export type TechnologyNameLoader = () => Promise<ReadonlyMap<number, string>>;

export class TechnologyNameCache {
  private table: Promise<ReadonlyMap<number, string>> | null = null;

  constructor(private readonly loader: TechnologyNameLoader) {}

  static fromFeed(feed: TechnologyNameFeed): TechnologyNameCache {
    return new TechnologyNameCache(() => feed.fetchTechnologyNames());
  }

  static fixed(table: ReadonlyMap<number, string>): TechnologyNameCache {
    return new TechnologyNameCache(async () => table);
  }

  /**
   * Load the table, sharing one in-flight load between concurrent callers.
   * A failed load is not cached.
   */
  async getTable(): Promise<ReadonlyMap<number, string>> {
    if (!this.table) {
      this.table = this.loader().catch((error: unknown) => {
        this.table = null;
        throw error;
      });
    }
    return this.table;
  }

  /**
   * Display name for a type id, or "#<id>" when the table has none
   */
  async nameOf(typeId: number): Promise<string> {
    const table = await this.getTable();
    return table.get(typeId) ?? `#${typeId}`;
  }

  async labelAll(values: ReadonlyMap<number, number>): Promise<Record<string, number>> {
    const table = await this.getTable();
    const labelled: Record<string, number> = {};
    for (const [typeId, value] of values) {
      labelled[table.get(typeId) ?? `#${typeId}`] = value;
    }
    return labelled;
  }

  invalidate(): void {
    this.table = null;
  }
}
