/**
 * Store Adapter Contracts
 *
 * One adapter per entity kind. The authoritative side backs them with SQLite
 * tables, the bot with JSON files. Upsert matches by key only: the supplied
 * entity becomes the row, nothing is merged.
 */

export interface UpsertResult<T> {
  entity: T;
  created: boolean;
}

/**
 * Equality filter over an entity's primitive-valued fields.
 */
export type EntityFilter<T> = {
  [P in keyof T]?: Extract<T[P], string | number | boolean | null>;
};

export interface ListOptions {
  limit?: number;
}

export interface StoreAdapter<T, K> {
  get(key: K): Promise<T | null>;
  upsert(entity: T): Promise<UpsertResult<T>>;
  list(filter?: EntityFilter<T>, options?: ListOptions): Promise<T[]>;
}

export interface RemovableStore<T, K> extends StoreAdapter<T, K> {
  /** Resolves false when nothing was stored under the key. */
  remove(key: K): Promise<boolean>;
}

/**
 * Append-only log. No update or delete exists for these entities.
 */
export interface AppendOnlyStore<T, I> {
  append(input: I): Promise<T>;
  list(filter?: EntityFilter<T>, options?: ListOptions): Promise<T[]>;
}

export function matchesFilter<T extends object>(entity: T, filter: EntityFilter<T>): boolean {
  return Object.entries(filter).every(
    ([field, expected]) => expected === undefined || Reflect.get(entity, field) === expected,
  );
}
