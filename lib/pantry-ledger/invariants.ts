/**
 * Pantry Ledger Invariants
 *
 * Runtime checks run before any batch row is persisted.
 *
 * INVARIANTS:
 * - 0 <= remaining_quantity <= quantity
 * - discarded_quantity + remaining_quantity <= quantity (consumed never negative)
 * - status 'discarded' implies nothing remaining
 * - For one ingredient: remaining + allocated + discarded = purchased
 */

import type { PurchaseBatch, UsageRecord } from '../../types/pantry-ledger';
import { inconsistentState } from './errors';
import { EPSILON } from './ledger/fifo';

// =============================================================================
// BATCH VALIDATION
// =============================================================================

export type ValidationError = {
  field: string;
  message: string;
};

export type ValidationResult = {
  valid: boolean;
  errors: ValidationError[];
};

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export function validateBatch(batch: PurchaseBatch): ValidationResult {
  const errors: ValidationError[] = [];

  if (!batch.household_key) {
    errors.push({ field: 'household_key', message: 'household_key is required' });
  }

  if (!isNonNegative(batch.quantity)) {
    errors.push({ field: 'quantity', message: 'quantity must be a non-negative number' });
  }

  if (!isNonNegative(batch.unit_cost)) {
    errors.push({ field: 'unit_cost', message: 'unit_cost must be a non-negative number' });
  }

  if (!isNonNegative(batch.remaining_quantity)) {
    errors.push({ field: 'remaining_quantity', message: 'remaining_quantity must be a non-negative number' });
  } else if (batch.remaining_quantity > batch.quantity + EPSILON) {
    errors.push({ field: 'remaining_quantity', message: 'remaining_quantity exceeds quantity' });
  }

  if (!isNonNegative(batch.discarded_quantity)) {
    errors.push({ field: 'discarded_quantity', message: 'discarded_quantity must be a non-negative number' });
  } else if (batch.discarded_quantity + batch.remaining_quantity > batch.quantity + EPSILON) {
    errors.push({
      field: 'discarded_quantity',
      message: 'discarded_quantity + remaining_quantity exceeds quantity',
    });
  }

  if (!isNonNegative(batch.discarded_cost)) {
    errors.push({ field: 'discarded_cost', message: 'discarded_cost must be a non-negative number' });
  }

  if (batch.status === 'discarded' && batch.remaining_quantity > EPSILON) {
    errors.push({ field: 'status', message: 'discarded batch still has stock' });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Throws inconsistent_state listing every broken field.
 */
export function assertBatchInvariants(batch: PurchaseBatch): void {
  const result = validateBatch(batch);
  if (!result.valid) {
    const detail = result.errors.map(e => `${e.field}: ${e.message}`).join('; ');
    throw inconsistentState(`INVARIANT VIOLATION on batch ${batch.id}: ${detail}`);
  }
}

// =============================================================================
// CONSERVATION
// =============================================================================

export type ConservationReport = {
  holds: boolean;
  purchased: number;
  remaining: number;
  allocated: number;
  discarded: number;
};

/**
 * Σ remaining + Σ traced allocations + Σ discarded = Σ purchased.
 * Only meaningful when every usage of these batches carries a trace.
 */
export function checkConservation(
  batches: readonly PurchaseBatch[],
  usages: readonly UsageRecord[]
): ConservationReport {
  const batchIds = new Set(batches.map(b => b.id));

  let purchased = 0;
  let remaining = 0;
  let discarded = 0;
  for (const batch of batches) {
    purchased += batch.quantity;
    remaining += batch.remaining_quantity;
    discarded += batch.discarded_quantity;
  }

  let allocated = 0;
  for (const usage of usages) {
    for (const allocation of usage.allocations ?? []) {
      if (batchIds.has(allocation.batch_id)) {
        allocated += allocation.quantity;
      }
    }
  }

  const tolerance = EPSILON * Math.max(1, batches.length + usages.length) * Math.max(1, purchased);

  return {
    holds: Math.abs(remaining + allocated + discarded - purchased) <= tolerance,
    purchased,
    remaining,
    allocated,
    discarded,
  };
}
