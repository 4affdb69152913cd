/**
 * Usage Reversal
 *
 * Puts a usage's quantity back into its ingredient's batches and deletes
 * the usage, atomically.
 *
 * - Traced usage: each (batch, quantity) pair goes back where it came from.
 * - Untraced usage: refill the oldest consumed-from batches first. When
 *   usages interleave on one ingredient this lands stock in different
 *   batches than it left, so costs of later allocations can shift.
 *
 * Only the costed part is restored: the uncosted shortfall never left a batch.
 */

import type { PurchaseBatch } from '../../../types/pantry-ledger';
import type { LedgerAdapter } from '../db/client';
import { inconsistentState, notFound } from '../errors';
import { assertBatchInvariants } from '../invariants';
import { record } from '../monitoring/metrics';
import {
  EPSILON,
  mostRecentBatch,
  planHeuristicRestoration,
  planTracedRestoration,
  toBatchUpdate,
  type RestorationPlan,
} from './fifo';

function planFor(
  batches: PurchaseBatch[],
  usageId: string,
  allocations: { batch_id: string; quantity: number }[] | null,
  quantity: number
): RestorationPlan {
  if (allocations) {
    return planTracedRestoration(batches, allocations);
  }

  record('reversal_heuristic');
  const plan = planHeuristicRestoration(batches, quantity);
  if (plan.unplaced > EPSILON) {
    record('reversal_fallback');
    const newest = mostRecentBatch(batches);
    throw inconsistentState(
      newest
        ? `usage ${usageId}: ${plan.unplaced} left to restore but batch ${newest.id} and every older batch are full`
        : `usage ${usageId}: no batch left to restore ${plan.unplaced} into`
    );
  }
  return plan;
}

export async function reverseUsage(
  db: LedgerAdapter,
  householdKey: string,
  usageId: string
): Promise<void> {
  await db.transaction(async tx => {
    const unlocked = await tx.getUsage(householdKey, usageId);
    if (!unlocked) {
      throw notFound('usage', usageId);
    }
    await tx.lockIngredient(householdKey, unlocked.ingredient_id);

    // A concurrent reversal may have won the lock
    const usage = await tx.getUsage(householdKey, usageId);
    if (!usage) {
      throw notFound('usage', usageId);
    }

    const batches = await tx.listBatchesForIngredient(householdKey, usage.ingredient_id);
    const quantity = Math.max(0, usage.quantity - usage.uncosted_quantity);
    const plan = planFor(batches, usage.id, usage.allocations, quantity);

    for (const batch of plan.updated) {
      assertBatchInvariants(batch);
      await tx.updateBatch(householdKey, batch.id, toBatchUpdate(batch));
    }

    const deleted = await tx.deleteUsage(householdKey, usage.id);
    if (!deleted) {
      throw notFound('usage', usage.id);
    }
    record('usage_reversed');
  });
}
