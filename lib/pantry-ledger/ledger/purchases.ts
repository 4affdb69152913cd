/**
 * Purchases
 *
 * Ingredients, single purchase batches and whole shopping trips.
 * A trip's event and all of its batches are created in one transaction.
 */

import { randomUUID } from 'crypto';
import type {
  IngredientRecord,
  NewIngredientInput,
  PurchaseBatch,
  PurchaseBatchInput,
  ShoppingEvent,
  ShoppingTripInput,
  ShoppingTripResult,
} from '../../../types/pantry-ledger';
import type { LedgerAdapter, LedgerTx } from '../db/client';
import { assertIsoDate } from '../dates';
import { invalidAmount, notFound } from '../errors';
import { assertBatchInvariants } from '../invariants';
import { record } from '../monitoring/metrics';

export const DEFAULT_CATEGORY = 'other';

export interface PurchaseOptions {
  now?: Date;
}

function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw invalidAmount(`${field} must be a non-negative number, got ${value}`);
  }
}

function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw invalidAmount('ingredient name is required');
  }
  return trimmed;
}

// =============================================================================
// INGREDIENTS
// =============================================================================

function buildIngredient(householdKey: string, input: NewIngredientInput, now: Date): IngredientRecord {
  return {
    id: randomUUID(),
    household_key: householdKey,
    name: normalizeName(input.name),
    category: input.category?.trim() || DEFAULT_CATEGORY,
    mode: input.mode ?? 'precision',
    standard_unit: input.standardUnit ?? 'g',
    created_at: now.toISOString(),
  };
}

async function findOrCreateWithinTx(
  tx: LedgerTx,
  householdKey: string,
  input: NewIngredientInput,
  now: Date
): Promise<IngredientRecord> {
  const name = normalizeName(input.name);
  await tx.lockIngredientName(householdKey, name);
  const existing = await tx.getIngredientByName(householdKey, name);
  if (existing) {
    return existing;
  }
  const ingredient = buildIngredient(householdKey, input, now);
  await tx.insertIngredient(ingredient);
  return ingredient;
}

/**
 * @throws invalid_amount when the household already has an ingredient of that name
 */
export async function createIngredient(
  db: LedgerAdapter,
  householdKey: string,
  input: NewIngredientInput,
  options: PurchaseOptions = {}
): Promise<IngredientRecord> {
  const ingredient = buildIngredient(householdKey, input, options.now ?? new Date());
  return db.transaction(async tx => {
    await tx.lockIngredientName(householdKey, ingredient.name);
    if (await tx.getIngredientByName(householdKey, ingredient.name)) {
      throw invalidAmount(`ingredient already exists: ${ingredient.name}`);
    }
    await tx.insertIngredient(ingredient);
    return ingredient;
  });
}

export async function findOrCreateIngredient(
  db: LedgerAdapter,
  householdKey: string,
  input: NewIngredientInput,
  options: PurchaseOptions = {}
): Promise<IngredientRecord> {
  return db.transaction(tx => findOrCreateWithinTx(tx, householdKey, input, options.now ?? new Date()));
}

export async function listIngredients(db: LedgerAdapter, householdKey: string): Promise<IngredientRecord[]> {
  return db.listIngredients(householdKey);
}

// =============================================================================
// PURCHASE BATCHES
// =============================================================================

function validateBatchInput(input: PurchaseBatchInput): void {
  assertNonNegative(input.quantity, 'quantity');
  assertNonNegative(input.unitCost, 'unitCost');
  assertIsoDate(input.purchaseDate, 'purchaseDate');
  if (input.expiryDate) {
    assertIsoDate(input.expiryDate, 'expiryDate');
  }
}

async function insertBatchWithinTx(
  tx: LedgerTx,
  householdKey: string,
  input: PurchaseBatchInput,
  now: Date
): Promise<PurchaseBatch> {
  const batch: PurchaseBatch = {
    id: randomUUID(),
    household_key: householdKey,
    ingredient_id: input.ingredientId,
    shopping_event_id: input.shoppingEventId ?? null,
    purchase_date: input.purchaseDate,
    expiry_date: input.expiryDate || null,
    quantity: input.quantity,
    remaining_quantity: input.quantity,
    unit_cost: input.unitCost,
    discarded_quantity: 0,
    discarded_cost: 0,
    status: 'active',
    created_at: now.toISOString(),
  };
  assertBatchInvariants(batch);
  await tx.insertBatch(batch);
  record('purchase_recorded');
  return batch;
}

/**
 * Add one batch. When linked to a shopping event, quantity × unitCost is
 * added to the event's total_cost.
 */
export async function recordPurchaseBatch(
  db: LedgerAdapter,
  householdKey: string,
  input: PurchaseBatchInput,
  options: PurchaseOptions = {}
): Promise<string> {
  validateBatchInput(input);

  return db.transaction(async tx => {
    await tx.lockIngredient(householdKey, input.ingredientId);
    if (!(await tx.getIngredient(householdKey, input.ingredientId))) {
      throw notFound('ingredient', input.ingredientId);
    }

    const eventId = input.shoppingEventId ?? null;
    if (eventId && !(await tx.getShoppingEvent(householdKey, eventId))) {
      throw notFound('shopping event', eventId);
    }

    const batch = await insertBatchWithinTx(tx, householdKey, input, options.now ?? new Date());
    if (eventId) {
      await tx.addShoppingEventTotals(householdKey, eventId, { cost: batch.quantity * batch.unit_cost });
    }
    return batch.id;
  });
}

// =============================================================================
// SHOPPING TRIPS
// =============================================================================

/**
 * totalPaid / Σ item prices, 1 when no total was given or nothing was priced.
 */
export function discountRatio(itemPrices: readonly number[], totalPaid?: number | null): number {
  const sum = itemPrices.reduce((a, b) => a + b, 0);
  if (totalPaid === undefined || totalPaid === null || sum <= 0) {
    return 1;
  }
  return totalPaid / sum;
}

/**
 * One event plus a batch per item. Ingredients are matched by name and
 * created on first sight. Every line price is scaled by the discount ratio
 * before being split into a unit cost.
 */
export async function recordShoppingTrip(
  db: LedgerAdapter,
  householdKey: string,
  input: ShoppingTripInput,
  options: PurchaseOptions = {}
): Promise<ShoppingTripResult> {
  assertIsoDate(input.date, 'date');
  if (input.items.length === 0) {
    throw invalidAmount('shopping trip has no items');
  }
  for (const item of input.items) {
    normalizeName(item.name);
    assertNonNegative(item.price, 'price');
    if (!Number.isFinite(item.quantity) || item.quantity <= 0) {
      throw invalidAmount(`quantity of ${item.name} must be positive, got ${item.quantity}`);
    }
    if (item.expiryDate) {
      assertIsoDate(item.expiryDate, 'expiryDate');
    }
  }
  if (input.totalPaid !== undefined && input.totalPaid !== null) {
    assertNonNegative(input.totalPaid, 'totalPaid');
  }

  const ratio = discountRatio(
    input.items.map(i => i.price),
    input.totalPaid
  );
  const finalPrices = input.items.map(i => i.price * ratio);
  const totalCost = finalPrices.reduce((a, b) => a + b, 0);
  const now = options.now ?? new Date();

  return db.transaction(async tx => {
    // Sorted so two trips sharing new names cannot wait on each other
    const names = Array.from(new Set(input.items.map(i => normalizeName(i.name)))).sort();
    for (const name of names) {
      await tx.lockIngredientName(householdKey, name);
    }

    const event: ShoppingEvent = {
      id: randomUUID(),
      household_key: householdKey,
      date: input.date,
      location: input.location?.trim() ?? '',
      total_cost: totalCost,
      total_waste: 0,
      created_at: now.toISOString(),
    };
    await tx.insertShoppingEvent(event);

    const batchIds: string[] = [];
    for (let i = 0; i < input.items.length; i++) {
      const item = input.items[i];
      const ingredient = await findOrCreateWithinTx(
        tx,
        householdKey,
        { name: item.name, category: item.category, standardUnit: item.unit },
        now
      );

      const batch = await insertBatchWithinTx(
        tx,
        householdKey,
        {
          ingredientId: ingredient.id,
          quantity: item.quantity,
          unitCost: finalPrices[i] / item.quantity,
          purchaseDate: input.date,
          expiryDate: item.expiryDate ?? null,
          shoppingEventId: event.id,
        },
        now
      );
      batchIds.push(batch.id);
    }

    return {
      shoppingEventId: event.id,
      batchIds,
      totalCost,
      discountRatio: ratio,
    };
  });
}
