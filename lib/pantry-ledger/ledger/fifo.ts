/**
 * FIFO Batch Planning
 *
 * Pure functions: given batch rows, work out what an allocation, a discard
 * or a restoration would change. Nothing here reads or writes the store;
 * the ledger operations persist the returned rows inside a transaction.
 *
 * Quantities are floats in the ingredient's standard unit. Anything within
 * EPSILON of zero is zero.
 */

import type {
  AllocationLine,
  BatchUpdate,
  PurchaseBatch,
  UsageAllocation,
} from '../../../types/pantry-ledger';
import { inconsistentState, invalidAmount } from '../errors';

export const EPSILON = 1e-9;

// =============================================================================
// ORDERING
// =============================================================================

type FifoKey = Pick<PurchaseBatch, 'purchase_date' | 'expiry_date'>;

/**
 * Oldest purchase first, then earliest expiry, batches without an expiry
 * after those with one. Returns 0 on a full tie: callers sort stably over
 * rows already in insertion order (SQL adds created_at, id).
 */
export function compareFifo(a: FifoKey, b: FifoKey): number {
  if (a.purchase_date !== b.purchase_date) {
    return a.purchase_date < b.purchase_date ? -1 : 1;
  }
  if (a.expiry_date === b.expiry_date) return 0;
  if (a.expiry_date === null) return 1;
  if (b.expiry_date === null) return -1;
  return a.expiry_date < b.expiry_date ? -1 : 1;
}

export function sortFifo<T extends FifoKey>(batches: readonly T[]): T[] {
  return [...batches].sort(compareFifo);
}

/**
 * Quantity that left the batch through usage (not waste).
 */
export function consumedQuantity(batch: PurchaseBatch): number {
  return batch.quantity - batch.remaining_quantity - batch.discarded_quantity;
}

function snapToZero(value: number): number {
  return Math.abs(value) <= EPSILON ? 0 : value;
}

function assertQuantity(quantity: number, field: string): void {
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw invalidAmount(`${field} must be a non-negative number, got ${quantity}`);
  }
}

export function toBatchUpdate(batch: PurchaseBatch): BatchUpdate {
  return {
    remaining_quantity: batch.remaining_quantity,
    discarded_quantity: batch.discarded_quantity,
    discarded_cost: batch.discarded_cost,
    status: batch.status,
  };
}

// =============================================================================
// ALLOCATION
// =============================================================================

export interface AllocationPlan {
  cost: number;
  requestedQuantity: number;
  allocatedQuantity: number;
  /** Demand left over once every batch is empty */
  shortfall: number;
  lines: AllocationLine[];
  /** Touched batches with their new remaining_quantity */
  updated: PurchaseBatch[];
}

/**
 * Walk batches oldest-first taking min(remaining, still needed) from each.
 */
export function planAllocation(batches: readonly PurchaseBatch[], quantity: number): AllocationPlan {
  assertQuantity(quantity, 'quantity');

  const lines: AllocationLine[] = [];
  const updated: PurchaseBatch[] = [];
  let needed = quantity;
  let cost = 0;

  for (const batch of sortFifo(batches)) {
    if (needed <= EPSILON) break;
    if (batch.remaining_quantity <= EPSILON) continue;

    const take = Math.min(batch.remaining_quantity, needed);
    const lineCost = take * batch.unit_cost;

    lines.push({ batch_id: batch.id, quantity: take, unit_cost: batch.unit_cost, cost: lineCost });
    updated.push({ ...batch, remaining_quantity: snapToZero(batch.remaining_quantity - take) });

    cost += lineCost;
    needed -= take;
  }

  const shortfall = snapToZero(needed);

  return {
    cost,
    requestedQuantity: quantity,
    allocatedQuantity: quantity - shortfall,
    shortfall,
    lines,
    updated,
  };
}

// =============================================================================
// DISCARD
// =============================================================================

export interface DiscardPlan {
  amount: number;
  wasteCost: number;
  updated: PurchaseBatch;
}

/**
 * amount defaults to everything left in the batch.
 * An emptied batch becomes 'discarded'.
 */
export function planDiscard(batch: PurchaseBatch, amount?: number): DiscardPlan {
  let take = amount ?? batch.remaining_quantity;
  assertQuantity(take, 'amount');

  if (take > batch.remaining_quantity + EPSILON) {
    throw invalidAmount(
      `cannot discard ${take} from batch ${batch.id}: only ${batch.remaining_quantity} remaining`
    );
  }
  take = Math.min(take, batch.remaining_quantity);

  const wasteCost = take * batch.unit_cost;
  const remaining = snapToZero(batch.remaining_quantity - take);

  return {
    amount: take,
    wasteCost,
    updated: {
      ...batch,
      remaining_quantity: remaining,
      discarded_quantity: batch.discarded_quantity + take,
      discarded_cost: batch.discarded_cost + wasteCost,
      status: remaining === 0 ? 'discarded' : batch.status,
    },
  };
}

// =============================================================================
// RESTORATION
// =============================================================================

export interface RestorationPlan {
  restored: number;
  /** Quantity no batch had room for */
  unplaced: number;
  updated: PurchaseBatch[];
}

function restoreInto(batch: PurchaseBatch, quantity: number): PurchaseBatch {
  return {
    ...batch,
    remaining_quantity: batch.remaining_quantity + quantity,
    status: 'active',
  };
}

/**
 * Undo a recorded allocation trace exactly, batch by batch.
 * Every traced batch must still exist and have consumed at least what is returned.
 */
export function planTracedRestoration(
  batches: readonly PurchaseBatch[],
  allocations: readonly UsageAllocation[]
): RestorationPlan {
  const byId = new Map(batches.map(b => [b.id, { ...b }]));
  let restored = 0;

  for (const allocation of allocations) {
    const batch = byId.get(allocation.batch_id);
    if (!batch) {
      throw inconsistentState(`traced batch no longer exists: ${allocation.batch_id}`);
    }
    if (allocation.quantity > consumedQuantity(batch) + EPSILON) {
      throw inconsistentState(
        `batch ${batch.id} cannot take back ${allocation.quantity}: only ${consumedQuantity(batch)} consumed`
      );
    }
    byId.set(batch.id, restoreInto(batch, allocation.quantity));
    restored += allocation.quantity;
  }

  const touched = new Set(allocations.map(a => a.batch_id));
  return {
    restored,
    unplaced: 0,
    updated: Array.from(byId.values()).filter(b => touched.has(b.id)),
  };
}

/**
 * Without a trace: refill the oldest batches that have been consumed from,
 * up to what each has had consumed. Whatever does not fit is reported as
 * unplaced.
 */
export function planHeuristicRestoration(
  batches: readonly PurchaseBatch[],
  quantity: number
): RestorationPlan {
  assertQuantity(quantity, 'quantity');

  const updated: PurchaseBatch[] = [];
  let toRestore = quantity;

  for (const batch of sortFifo(batches)) {
    if (toRestore <= EPSILON) break;
    const space = consumedQuantity(batch);
    if (space <= EPSILON) continue;

    const put = Math.min(space, toRestore);
    updated.push(restoreInto(batch, put));
    toRestore -= put;
  }

  const unplaced = snapToZero(toRestore);
  return { restored: quantity - unplaced, unplaced, updated };
}

/**
 * Newest purchase date wins; ties go to the later row in FIFO order.
 */
export function mostRecentBatch(batches: readonly PurchaseBatch[]): PurchaseBatch | null {
  const ordered = sortFifo(batches);
  return ordered.length > 0 ? ordered[ordered.length - 1] : null;
}
