/**
 * JSON File Stores
 *
 * The bot's local durable log. Each collection lives in one JSON document
 * `{ updated_at, items }`. Writes go through a per-store queue and replace
 * the file atomically, so concurrent upserts on the same key serialize and
 * the last one wins. Entries that fail the schema are logged and left out
 * of reads, and the next write drops them from the file.
 */

import { z } from 'zod';
import { safeReadFile, safeWriteFile, type Logger } from '@adsync/utils';
import { StoreUnavailableError } from '../errors/index.js';
import { logger as coreLogger } from '../logger.js';
import {
  matchesFilter,
  type AppendOnlyStore,
  type EntityFilter,
  type ListOptions,
  type RemovableStore,
  type UpsertResult,
} from './types.js';

interface JsonDocumentOptions<T> {
  /** Model name used in logs and errors. */
  name: string;
  filePath: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  logger?: Logger;
}

const documentSchema = z.object({ items: z.array(z.unknown()) });

/**
 * Shared read / queued write plumbing for a single JSON document.
 */
class JsonDocument<T> {
  private queue: Promise<unknown> = Promise.resolve();
  protected readonly log: Logger;

  constructor(protected readonly options: JsonDocumentOptions<T>) {
    this.log = (options.logger ?? coreLogger).child({ model: options.name, file: options.filePath });
  }

  async read(): Promise<T[]> {
    let content: string | null;
    try {
      content = await safeReadFile(this.options.filePath);
    } catch (error) {
      throw this.unavailable('read', error);
    }
    if (content === null || content.trim() === '') {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw this.unavailable('read', error);
    }

    const document = documentSchema.safeParse(parsed);
    if (!document.success) {
      throw this.unavailable('read', document.error);
    }

    const items: T[] = [];
    document.data.items.forEach((entry, index) => {
      const result = this.options.schema.safeParse(entry);
      if (result.success) {
        items.push(result.data);
        return;
      }
      const issue = result.error.issues[0];
      this.log.warn(
        { index, path: issue?.path.join('.'), reason: issue?.message },
        'Skipping invalid entry'
      );
    });
    return items;
  }

  /**
   * Run a read-modify-write cycle after every previously queued one.
   */
  mutate<R>(change: (items: T[]) => { items: T[]; result: R }): Promise<R> {
    const run = this.queue.then(async () => {
      const { items, result } = change(await this.read());
      await this.write(items);
      return result;
    });
    // Keep the chain alive after a failure; the caller still gets the rejection from `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async write(items: T[]): Promise<void> {
    const document = { updated_at: new Date().toISOString(), items };
    try {
      await safeWriteFile(this.options.filePath, `${JSON.stringify(document, null, 2)}\n`);
    } catch (error) {
      throw this.unavailable('write', error);
    }
  }

  private unavailable(operation: string, error: unknown): StoreUnavailableError {
    this.log.error(
      { operation, error: error instanceof Error ? error.message : String(error) },
      'Local store operation failed'
    );
    return new StoreUnavailableError(this.options.name, operation, error);
  }
}

function applyLimit<T>(items: T[], options: ListOptions): T[] {
  return options.limit === undefined ? items : items.slice(0, options.limit);
}

export interface JsonFileStoreOptions<T, K> extends JsonDocumentOptions<T> {
  keyOf: (entity: T) => K;
}

/**
 * Keyed collection in a JSON file.
 */
export class JsonFileStore<T extends object, K extends string | number> implements RemovableStore<T, K> {
  private readonly document: JsonDocument<T>;
  private readonly keyOf: (entity: T) => K;

  constructor(options: JsonFileStoreOptions<T, K>) {
    this.document = new JsonDocument(options);
    this.keyOf = options.keyOf;
  }

  async get(key: K): Promise<T | null> {
    const items = await this.document.read();
    return items.find((item) => this.keyOf(item) === key) ?? null;
  }

  async upsert(entity: T): Promise<UpsertResult<T>> {
    const key = this.keyOf(entity);
    return this.document.mutate<UpsertResult<T>>((items) => {
      const index = items.findIndex((item) => this.keyOf(item) === key);
      if (index === -1) {
        return { items: [...items, entity], result: { entity, created: true } };
      }
      const next = [...items];
      next[index] = entity;
      return { items: next, result: { entity, created: false } };
    });
  }

  async remove(key: K): Promise<boolean> {
    return this.document.mutate((items) => {
      const next = items.filter((item) => this.keyOf(item) !== key);
      return { items: next, result: next.length !== items.length };
    });
  }

  async list(filter: EntityFilter<T> = {}, options: ListOptions = {}): Promise<T[]> {
    const items = await this.document.read();
    return applyLimit(items.filter((item) => matchesFilter(item, filter)), options);
  }
}

export interface JsonAppendLogOptions<T> extends JsonDocumentOptions<T> {
  /** Oldest entries are dropped beyond this many. */
  maxEntries: number;
  /** Build the stored entry from the input and the next sequence id. */
  build: (input: Omit<T, 'id'>, id: number) => T;
}

/**
 * Append-only log in a JSON file with a monotonic integer id.
 */
export class JsonAppendLog<T extends { id: number }> implements AppendOnlyStore<T, Omit<T, 'id'>> {
  private readonly document: JsonDocument<T>;

  constructor(private readonly options: JsonAppendLogOptions<T>) {
    this.document = new JsonDocument(options);
  }

  async append(input: Omit<T, 'id'>): Promise<T> {
    return this.document.mutate((items) => {
      const lastId = items.reduce((max, item) => Math.max(max, item.id), 0);
      const entry = this.options.build(input, lastId + 1);
      const next = [...items, entry];
      const trimmed = next.length > this.options.maxEntries
        ? next.slice(next.length - this.options.maxEntries)
        : next;
      return { items: trimmed, result: entry };
    });
  }

  async list(filter: EntityFilter<T> = {}, options: ListOptions = {}): Promise<T[]> {
    const items = await this.document.read();
    return applyLimit(items.filter((item) => matchesFilter(item, filter)), options);
  }
}
