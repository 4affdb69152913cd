/**
 * FIFO Allocator
 *
 * Consumes stock oldest batch first and prices it at each batch's unit cost.
 * Batch decrements and the returned cost are one transaction under the
 * ingredient lock.
 */

import type { AllocationResult } from '../../../types/pantry-ledger';
import type { LedgerAdapter, LedgerTx } from '../db/client';
import { getFlags, type ShortfallPolicy } from '../config/flags';
import { LedgerError, notFound } from '../errors';
import { assertBatchInvariants } from '../invariants';
import { record } from '../monitoring/metrics';
import { EPSILON, planAllocation, toBatchUpdate } from './fifo';

export interface AllocateOptions {
  /** Defaults to LEDGER_SHORTFALL_POLICY */
  shortfallPolicy?: ShortfallPolicy;
}

function assertRequestedQuantity(quantity: number): void {
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw new LedgerError('invalid_amount', `quantity must be a non-negative number, got ${quantity}`);
  }
}

/**
 * Allocate inside a caller's transaction. Used by usage recording so the
 * batch decrements and the usage row commit together.
 */
export async function allocateWithinTx(
  tx: LedgerTx,
  householdKey: string,
  ingredientId: string,
  quantity: number,
  options: AllocateOptions = {}
): Promise<AllocationResult> {
  assertRequestedQuantity(quantity);

  await tx.lockIngredient(householdKey, ingredientId);

  const ingredient = await tx.getIngredient(householdKey, ingredientId);
  if (!ingredient) {
    throw notFound('ingredient', ingredientId);
  }

  record('allocation_called');

  const batches = await tx.listBatchesForIngredient(householdKey, ingredientId);
  const plan = planAllocation(batches, quantity);

  if (plan.shortfall > EPSILON) {
    const policy = options.shortfallPolicy ?? getFlags().shortfallPolicy;
    if (policy === 'reject') {
      record('allocation_rejected');
      throw new LedgerError(
        'insufficient_stock',
        `requested ${quantity} of ingredient ${ingredientId}, only ${plan.allocatedQuantity} in stock`
      );
    }
    record('allocation_shortfall');
    console.warn(
      `[Ledger] Shortfall of ${plan.shortfall} on ingredient ${ingredientId}; recorded without cost`
    );
  }

  for (const batch of plan.updated) {
    assertBatchInvariants(batch);
    await tx.updateBatch(householdKey, batch.id, toBatchUpdate(batch));
  }

  return {
    cost: plan.cost,
    requestedQuantity: plan.requestedQuantity,
    allocatedQuantity: plan.allocatedQuantity,
    shortfall: plan.shortfall,
    allocations: plan.lines,
  };
}

/**
 * allocate(ingredient, quantity) -> cost plus the per-batch breakdown.
 *
 * quantity 0 returns cost 0 and writes nothing.
 */
export async function allocate(
  db: LedgerAdapter,
  householdKey: string,
  ingredientId: string,
  quantity: number,
  options: AllocateOptions = {}
): Promise<AllocationResult> {
  assertRequestedQuantity(quantity);
  return db.transaction(tx => allocateWithinTx(tx, householdKey, ingredientId, quantity, options));
}

/**
 * Unit cost the next allocation would start at (0 with no stock).
 */
export async function estimateUnitCost(
  db: LedgerAdapter,
  householdKey: string,
  ingredientId: string
): Promise<number> {
  const ingredient = await db.getIngredient(householdKey, ingredientId);
  if (!ingredient) {
    throw notFound('ingredient', ingredientId);
  }
  const batches = await db.listBatchesForIngredient(householdKey, ingredientId);
  const next = batches.find(b => b.remaining_quantity > EPSILON);
  return next ? next.unit_cost : 0;
}
