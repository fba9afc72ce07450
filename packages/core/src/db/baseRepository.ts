/**
 * Base Repository Pattern
 *
 * Common SQLite operations for one table. Concrete repositories describe
 * their table through a TableMapping and expose the store contract
 * (StoreAdapter, RemovableStore or AppendOnlyStore) on top.
 *
 * Every driver failure is logged with model and operation, then rethrown
 * as StoreUnavailableError.
 */

import { AdSyncError, StoreUnavailableError, ValidationError } from '../errors/index.js';
import { logger } from '../logger.js';
import type { EntityFilter, ListOptions, UpsertResult } from '../store/types.js';
import type { DatabaseConnection } from './client.js';

export type SqlValue = string | number | null;
export type SqlRow = Record<string, SqlValue>;

export interface TableMapping<T, K extends string | number, R extends SqlRow> {
  model: string;
  table: string;
  keyColumn: keyof R & string;
  columns: readonly (keyof R & string)[];
  /** Columns an upsert on an existing row leaves alone. */
  immutableColumns: readonly (keyof R & string)[];
  orderBy: string;
  /** Entity field name → column, for list filters. */
  filterColumns: Readonly<Record<string, keyof R & string>>;
  keyOf(entity: T): K;
  toRow(entity: T): R;
  fromRow(row: R): T;
}

function toSqlValue(value: unknown): SqlValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' || typeof value === 'number') return value;
  return null;
}

export abstract class BaseRepository<T, K extends string | number, R extends SqlRow> {
  protected readonly modelName: string;

  constructor(
    protected readonly db: DatabaseConnection,
    protected readonly mapping: TableMapping<T, K, R>,
  ) {
    this.modelName = mapping.model;
  }

  /**
   * Run a driver call, converting failures into StoreUnavailableError.
   */
  protected run<V>(operation: string, work: () => V): V {
    try {
      return work();
    } catch (error) {
      if (error instanceof AdSyncError) {
        throw error;
      }
      logger.error(
        {
          model: this.modelName,
          operation,
          error: error instanceof Error ? error.message : String(error),
        },
        'Store operation failed'
      );
      throw new StoreUnavailableError(this.modelName, operation, error);
    }
  }

  /**
   * Find a record by key
   */
  async get(key: K): Promise<T | null> {
    return this.run('get', () => this.selectByKey(key));
  }

  /**
   * Find records by equality filter
   */
  async list(filter: EntityFilter<T> = {}, options: ListOptions = {}): Promise<T[]> {
    return this.run('list', () => {
      const { clause, values } = this.whereClause(filter);
      const limit = options.limit === undefined ? '' : ' LIMIT ?';
      const params = options.limit === undefined ? values : [...values, options.limit];
      const rows = this.db
        .prepare<unknown[], R>(
          `SELECT * FROM ${this.mapping.table}${clause} ORDER BY ${this.mapping.orderBy}${limit}`
        )
        .all(...params);
      return rows.map((row) => this.mapping.fromRow(row));
    });
  }

  /**
   * Insert or replace by key inside one transaction. The stored created_at
   * and other immutable columns of an existing row survive.
   */
  protected async upsertRow(entity: T): Promise<UpsertResult<T>> {
    const { table, keyColumn, columns, immutableColumns } = this.mapping;
    const key = this.mapping.keyOf(entity);
    const row = this.mapping.toRow(entity);

    const updatable = columns.filter(
      (column) => column !== keyColumn && !immutableColumns.includes(column)
    );
    const sql = `
      INSERT INTO ${table} (${columns.join(', ')})
      VALUES (${columns.map((column) => `@${column}`).join(', ')})
      ON CONFLICT(${keyColumn}) DO UPDATE SET
        ${updatable.map((column) => `${column} = excluded.${column}`).join(',\n        ')}
    `;

    return this.run('upsert', () => {
      const transaction = this.db.transaction((): UpsertResult<T> => {
        const existed = this.db
          .prepare<[K], { found: number }>(`SELECT 1 AS found FROM ${table} WHERE ${keyColumn} = ?`)
          .get(key) !== undefined;

        this.db.prepare<[R]>(sql).run(row);

        const stored = this.selectByKey(key);
        if (!stored) {
          throw new Error(`${this.modelName} ${String(key)} missing after upsert`);
        }
        return { entity: stored, created: !existed };
      });
      const result = transaction();
      logger.debug({ model: this.modelName, key, created: result.created }, 'Record upserted');
      return result;
    });
  }

  /**
   * Delete a record by key. Resolves false when nothing matched.
   */
  protected async deleteRow(key: K): Promise<boolean> {
    return this.run('delete', () => {
      const result = this.db
        .prepare<[K]>(`DELETE FROM ${this.mapping.table} WHERE ${this.mapping.keyColumn} = ?`)
        .run(key);
      if (result.changes > 0) {
        logger.debug({ model: this.modelName, key }, 'Record deleted');
      }
      return result.changes > 0;
    });
  }

  protected selectByKey(key: K): T | null {
    const row = this.db
      .prepare<[K], R>(`SELECT * FROM ${this.mapping.table} WHERE ${this.mapping.keyColumn} = ?`)
      .get(key);
    return row ? this.mapping.fromRow(row) : null;
  }

  private whereClause(filter: EntityFilter<T>): { clause: string; values: SqlValue[] } {
    const conditions: string[] = [];
    const values: SqlValue[] = [];

    for (const [field, expected] of Object.entries(filter)) {
      if (expected === undefined) continue;
      const column = this.mapping.filterColumns[field];
      if (!column) {
        throw new ValidationError('filter', `${this.modelName} cannot be filtered by ${field}`);
      }
      const value = toSqlValue(expected);
      if (value === null) {
        conditions.push(`${column} IS NULL`);
      } else {
        conditions.push(`${column} = ?`);
        values.push(value);
      }
    }

    return {
      clause: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
      values,
    };
  }
}

/**
 * Column helpers shared by the row mappers.
 */
export function parseJsonColumn(value: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(value);
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
}

export function toDateColumn(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function fromDateColumn(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}
