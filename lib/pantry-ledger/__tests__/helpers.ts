/**
 * Shared fixtures for ledger tests (in-memory adapter only).
 */

import type { PurchaseBatch, StandardUnit } from '../../../types/pantry-ledger';
import type { LedgerAdapter } from '../db/client';
import { createIngredient, recordPurchaseBatch } from '../ledger/purchases';

export const TEST_HOUSEHOLD_KEY = 'test-household';
export const OTHER_HOUSEHOLD_KEY = 'other-household';

export async function seedIngredient(
  db: LedgerAdapter,
  name: string,
  standardUnit: StandardUnit = 'g',
  householdKey: string = TEST_HOUSEHOLD_KEY
): Promise<string> {
  const ingredient = await createIngredient(db, householdKey, { name, standardUnit });
  return ingredient.id;
}

export async function seedBatch(
  db: LedgerAdapter,
  ingredientId: string,
  quantity: number,
  unitCost: number,
  purchaseDate: string,
  extra: { expiryDate?: string | null; shoppingEventId?: string | null } = {},
  householdKey: string = TEST_HOUSEHOLD_KEY
): Promise<string> {
  return recordPurchaseBatch(db, householdKey, {
    ingredientId,
    quantity,
    unitCost,
    purchaseDate,
    ...extra,
  });
}

export async function loadBatch(
  db: LedgerAdapter,
  batchId: string,
  householdKey: string = TEST_HOUSEHOLD_KEY
): Promise<PurchaseBatch> {
  const batch = await db.getBatch(householdKey, batchId);
  if (!batch) {
    throw new Error(`test batch missing: ${batchId}`);
  }
  return batch;
}

export function makeBatch(overrides: Partial<PurchaseBatch> = {}): PurchaseBatch {
  return {
    id: 'batch-1',
    household_key: TEST_HOUSEHOLD_KEY,
    ingredient_id: 'ingredient-1',
    shopping_event_id: null,
    purchase_date: '2024-03-01',
    expiry_date: null,
    quantity: 10,
    remaining_quantity: 10,
    unit_cost: 2,
    discarded_quantity: 0,
    discarded_cost: 0,
    status: 'active',
    created_at: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}
