import { loadDb, type Database } from './db';
import type { Tables } from './models';

export type CollectionName = keyof Tables;

export interface Query<T> {
  where?: Partial<T>;
  filter?: (row: T) => boolean;
  orderBy?: keyof T;
  descending?: boolean;
  limit?: number;
}

export interface UpsertOptions<T> {
  conflict: ReadonlyArray<keyof T>;
  // fields overwritten when the row already exists; all fields when omitted
  update?: ReadonlyArray<keyof T>;
}

/**
 * Predicate-filtered CRUD over named collections. Every call is its own
 * point write; there are no multi-row transactions.
 */
export interface Store {
  select<C extends CollectionName>(collection: C, query?: Query<Tables[C]>): Promise<Tables[C][]>;
  first<C extends CollectionName>(collection: C, query?: Query<Tables[C]>): Promise<Tables[C] | undefined>;
  insert<C extends CollectionName>(collection: C, row: Tables[C]): Promise<Tables[C]>;
  upsert<C extends CollectionName>(collection: C, row: Tables[C], options: UpsertOptions<Tables[C]>): Promise<Tables[C]>;
  update<C extends CollectionName>(collection: C, where: Partial<Tables[C]>, patch: Partial<Tables[C]>): Promise<number>;
  remove<C extends CollectionName>(collection: C, where: Partial<Tables[C]>): Promise<number>;
}

function matches<T extends object>(row: T, where: Partial<T> | undefined): boolean {
  if (!where) return true;
  for (const key in where) {
    const expected = where[key];
    if (expected !== undefined && row[key] !== expected) return false;
  }
  return true;
}

function compare(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return -1;
  if (b === null || b === undefined) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

export class LowdbStore implements Store {
  constructor(private readonly db: Database) {}

  private rows<C extends CollectionName>(collection: C): Tables[C][] {
    loadDb(this.db);
    return this.db.data[collection];
  }

  async select<C extends CollectionName>(collection: C, query: Query<Tables[C]> = {}): Promise<Tables[C][]> {
    const { where, filter, orderBy, descending, limit } = query;
    let rows = this.rows(collection).filter((row) => matches(row, where) && (!filter || filter(row)));
    if (orderBy !== undefined) {
      const direction = descending ? -1 : 1;
      rows = [...rows].sort((a, b) => direction * compare(a[orderBy], b[orderBy]));
    }
    if (limit !== undefined) rows = rows.slice(0, limit);
    return rows.map((row) => ({ ...row }));
  }

  async first<C extends CollectionName>(collection: C, query: Query<Tables[C]> = {}): Promise<Tables[C] | undefined> {
    const [row] = await this.select(collection, { ...query, limit: 1 });
    return row;
  }

  async insert<C extends CollectionName>(collection: C, row: Tables[C]): Promise<Tables[C]> {
    this.rows(collection).push({ ...row });
    this.db.write();
    return { ...row };
  }

  async upsert<C extends CollectionName>(
    collection: C,
    row: Tables[C],
    options: UpsertOptions<Tables[C]>
  ): Promise<Tables[C]> {
    const rows = this.rows(collection);
    const existing = rows.find((candidate) => options.conflict.every((key) => candidate[key] === row[key]));
    if (!existing) {
      rows.push({ ...row });
      this.db.write();
      return { ...row };
    }

    if (options.update) {
      for (const key of options.update) existing[key] = row[key];
    } else {
      Object.assign(existing, row);
    }
    this.db.write();
    return { ...existing };
  }

  async update<C extends CollectionName>(
    collection: C,
    where: Partial<Tables[C]>,
    patch: Partial<Tables[C]>
  ): Promise<number> {
    let count = 0;
    for (const row of this.rows(collection)) {
      if (!matches(row, where)) continue;
      Object.assign(row, patch);
      count += 1;
    }
    if (count > 0) this.db.write();
    return count;
  }

  async remove<C extends CollectionName>(collection: C, where: Partial<Tables[C]>): Promise<number> {
    const rows = this.rows(collection);
    let count = 0;
    for (let i = rows.length - 1; i >= 0; i -= 1) {
      if (!matches(rows[i], where)) continue;
      rows.splice(i, 1);
      count += 1;
    }
    if (count > 0) this.db.write();
    return count;
  }
}
