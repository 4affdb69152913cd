/**
 * Waste Recorder
 *
 * Moves stock from remaining to discarded at the batch's unit cost and adds
 * the waste cost onto the owning shopping event's running total_waste.
 *
 * There is no inverse: a discard cannot be reverted.
 */

import type { DiscardResult, PurchaseBatch } from '../../../types/pantry-ledger';
import type { LedgerAdapter, LedgerTx } from '../db/client';
import { notFound } from '../errors';
import { assertBatchInvariants } from '../invariants';
import { record } from '../monitoring/metrics';
import { planDiscard, toBatchUpdate } from './fifo';

/**
 * Read the batch, take its ingredient lock, read it again under the lock.
 */
async function lockBatch(tx: LedgerTx, householdKey: string, batchId: string): Promise<PurchaseBatch> {
  const unlocked = await tx.getBatch(householdKey, batchId);
  if (!unlocked) {
    throw notFound('batch', batchId);
  }
  await tx.lockIngredient(householdKey, unlocked.ingredient_id);

  const batch = await tx.getBatch(householdKey, batchId);
  if (!batch) {
    throw notFound('batch', batchId);
  }
  return batch;
}

async function applyDiscard(
  tx: LedgerTx,
  householdKey: string,
  batch: PurchaseBatch,
  amount?: number
): Promise<number> {
  const plan = planDiscard(batch, amount);
  assertBatchInvariants(plan.updated);

  await tx.updateBatch(householdKey, batch.id, toBatchUpdate(plan.updated));
  if (batch.shopping_event_id && plan.wasteCost !== 0) {
    await tx.addShoppingEventTotals(householdKey, batch.shopping_event_id, { waste: plan.wasteCost });
  }
  return plan.wasteCost;
}

/**
 * Discard `amount` (default: everything remaining) from a batch.
 *
 * @returns waste cost = amount × unit_cost
 * @throws invalid_amount when amount is negative or exceeds remaining (batch untouched)
 */
export async function discard(
  db: LedgerAdapter,
  householdKey: string,
  batchId: string,
  amount?: number
): Promise<number> {
  record('discard_called');
  return db.transaction(async tx => {
    const batch = await lockBatch(tx, householdKey, batchId);
    return applyDiscard(tx, householdKey, batch, amount);
  });
}

/**
 * Mark a batch discarded, wasting whatever is left.
 * Already discarded: no-op with changed=false.
 */
export async function setFullyDiscarded(
  db: LedgerAdapter,
  householdKey: string,
  batchId: string
): Promise<DiscardResult> {
  record('discard_called');
  return db.transaction(async tx => {
    const batch = await lockBatch(tx, householdKey, batchId);
    if (batch.status === 'discarded') {
      record('discard_noop');
      return { changed: false, wasteCost: 0 };
    }
    const wasteCost = await applyDiscard(tx, householdKey, batch);
    return { changed: true, wasteCost };
  });
}
