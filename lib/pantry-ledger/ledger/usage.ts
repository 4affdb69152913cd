/**
 * Usage Recording
 *
 * A usage = convert the entered amount to the standard unit, allocate it
 * FIFO, store the Usage row. All in one transaction.
 */

import { randomUUID } from 'crypto';
import type {
  MealInput,
  RecordedUsage,
  UsageInput,
  UsageRecord,
} from '../../../types/pantry-ledger';
import type { LedgerAdapter, LedgerTx } from '../db/client';
import { getFlags } from '../config/flags';
import { assertIsoDate } from '../dates';
import { notFound } from '../errors';
import { record } from '../monitoring/metrics';
import { convertToStandard } from '../units';
import { allocateWithinTx, type AllocateOptions } from './allocator';

export interface RecordUsageOptions extends AllocateOptions {
  /** Defaults to LEDGER_ALLOCATION_TRACE */
  allocationTrace?: boolean;
  now?: Date;
}

interface ConvertedItem {
  ingredientId: string;
  amount: number;
  unitName: string | null;
  quantity: number;
}

async function convertItem(
  db: LedgerAdapter,
  item: Omit<UsageInput, 'usageDate' | 'mealLabel'>
): Promise<ConvertedItem> {
  const converted = await convertToStandard(db, item.amount, item.unitName);
  return {
    ingredientId: item.ingredientId,
    amount: item.amount,
    unitName: converted.unitName,
    quantity: converted.quantity,
  };
}

async function recordWithinTx(
  tx: LedgerTx,
  householdKey: string,
  item: ConvertedItem,
  usageDate: string,
  mealLabel: string,
  options: RecordUsageOptions
): Promise<RecordedUsage> {
  const allocation = await allocateWithinTx(tx, householdKey, item.ingredientId, item.quantity, options);

  const ingredient = await tx.getIngredient(householdKey, item.ingredientId);
  if (!ingredient) {
    throw notFound('ingredient', item.ingredientId);
  }

  const trace = options.allocationTrace ?? getFlags().allocationTraceEnabled;
  const usage: UsageRecord = {
    id: randomUUID(),
    household_key: householdKey,
    ingredient_id: item.ingredientId,
    usage_date: usageDate,
    meal_label: mealLabel,
    input_label: `${item.amount} ${item.unitName ?? ingredient.standard_unit}`,
    quantity: item.quantity,
    cost: allocation.cost,
    uncosted_quantity: allocation.shortfall,
    allocations: trace
      ? allocation.allocations.map(line => ({ batch_id: line.batch_id, quantity: line.quantity }))
      : null,
    created_at: (options.now ?? new Date()).toISOString(),
  };

  await tx.insertUsage(usage);
  record('usage_recorded');

  return {
    usageId: usage.id,
    quantity: usage.quantity,
    cost: usage.cost,
    shortfall: allocation.shortfall,
  };
}

export async function recordUsage(
  db: LedgerAdapter,
  householdKey: string,
  input: UsageInput,
  options: RecordUsageOptions = {}
): Promise<RecordedUsage> {
  assertIsoDate(input.usageDate, 'usageDate');
  const item = await convertItem(db, input);

  return db.transaction(tx =>
    recordWithinTx(tx, householdKey, item, input.usageDate, input.mealLabel ?? '', options)
  );
}

/**
 * Several usages under one meal label, all or nothing.
 * Ingredient locks are taken up front in id order so two meals sharing
 * ingredients cannot deadlock.
 */
export async function recordMeal(
  db: LedgerAdapter,
  householdKey: string,
  input: MealInput,
  options: RecordUsageOptions = {}
): Promise<RecordedUsage[]> {
  assertIsoDate(input.usageDate, 'usageDate');

  const items: ConvertedItem[] = [];
  for (const item of input.items) {
    items.push(await convertItem(db, item));
  }
  if (items.length === 0) {
    return [];
  }

  const lockOrder = Array.from(new Set(items.map(i => i.ingredientId))).sort();

  return db.transaction(async tx => {
    for (const ingredientId of lockOrder) {
      await tx.lockIngredient(householdKey, ingredientId);
    }

    const recorded: RecordedUsage[] = [];
    for (const item of items) {
      recorded.push(
        await recordWithinTx(tx, householdKey, item, input.usageDate, input.mealLabel ?? '', options)
      );
    }
    return recorded;
  });
}
