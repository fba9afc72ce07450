/**
 * Bulk Upsert Orchestrator
 *
 * Applies the Upsert Engine to each item of a batch on its own. One bad
 * item never aborts the others and there is no batch-wide transaction.
 * Outcomes come back in input order.
 */

import { isArray } from '@adsync/utils';
import { toErrorResult, ValidationError, type ResultKind } from '../errors/index.js';
import type { EntityKind, EntityMap, UpsertEngine, UpsertOutcome } from './upsertEngine.js';

export type BulkItemOutcome<T> =
  | { index: number; ok: true; entity: T; created: boolean }
  | { index: number; ok: false; kind: ResultKind; message: string };

export interface BulkSummary {
  created: number;
  updated: number;
  failed: number;
}

/**
 * Run `apply` over every item in order, isolating failures per item.
 */
export async function bulkApply<T>(
  items: unknown,
  apply: (item: unknown, index: number) => Promise<UpsertOutcome<T>>,
): Promise<BulkItemOutcome<T>[]> {
  if (!isArray(items)) {
    throw new ValidationError('items', 'must be a list');
  }

  const outcomes: BulkItemOutcome<T>[] = [];
  // Sequential: same-key items in one batch resolve in input order.
  for (const [index, item] of items.entries()) {
    try {
      const { entity, created } = await apply(item, index);
      outcomes.push({ index, ok: true, entity, created });
    } catch (error) {
      const { kind, message } = toErrorResult(error);
      outcomes.push({ index, ok: false, kind, message });
    }
  }
  return outcomes;
}

/**
 * Engine upsert of every item of one entity kind.
 */
export function bulkUpsert<K extends EntityKind>(
  engine: UpsertEngine,
  kind: K,
  items: unknown,
): Promise<BulkItemOutcome<EntityMap[K]>[]> {
  return bulkApply(items, (item) => engine.upsert(kind, item));
}

export function summarizeBulk<T>(outcomes: readonly BulkItemOutcome<T>[]): BulkSummary {
  return outcomes.reduce<BulkSummary>(
    (summary, outcome) => {
      if (!outcome.ok) {
        summary.failed += 1;
      } else if (outcome.created) {
        summary.created += 1;
      } else {
        summary.updated += 1;
      }
      return summary;
    },
    { created: 0, updated: 0, failed: 0 },
  );
}
