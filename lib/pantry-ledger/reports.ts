/**
 * Aggregates
 *
 * Read-only rollups over the ledger. The summarizers are pure; the get*
 * wrappers load rows through the adapter and never write.
 *
 * Attribution:
 * - usage cost counts on the usage date
 * - shopping cost and waste count on the shopping event's date
 *   (waste of batches outside any event is not in the rollups)
 */

import type {
  DailyStats,
  DailyTotals,
  DashboardSummary,
  ExpiringBatch,
  IngredientRecord,
  MealGroup,
  MonthlySummary,
  PurchaseBatch,
  ShoppingEvent,
  ShoppingEventDetail,
  UsageRecord,
} from '../../types/pantry-ledger';
import type { LedgerAdapter } from './db/client';
import { getFlags } from './config/flags';
import { assertIsoDate, dayRange, daysBetween, monthRange, todayIso } from './dates';
import { invalidAmount, notFound } from './errors';
import { EPSILON } from './ledger/fifo';

// =============================================================================
// PURE SUMMARIZERS
// =============================================================================

export function assetValue(batches: readonly PurchaseBatch[]): number {
  return batches
    .filter(b => b.remaining_quantity > EPSILON)
    .reduce((sum, b) => sum + b.remaining_quantity * b.unit_cost, 0);
}

/**
 * Stocked batches expiring between today and today + windowDays (inclusive),
 * soonest first. Already expired batches are not listed.
 */
export function expiringSoon(
  batches: readonly PurchaseBatch[],
  ingredients: ReadonlyMap<string, IngredientRecord>,
  windowDays: number,
  today: string
): ExpiringBatch[] {
  const items: ExpiringBatch[] = [];

  for (const batch of batches) {
    if (batch.remaining_quantity <= EPSILON || !batch.expiry_date) continue;

    const daysLeft = daysBetween(today, batch.expiry_date);
    if (daysLeft < 0 || daysLeft > windowDays) continue;

    const ingredient = ingredients.get(batch.ingredient_id);
    items.push({
      batch_id: batch.id,
      ingredient_id: batch.ingredient_id,
      name: ingredient?.name ?? '',
      days_left: daysLeft,
      potential_loss: batch.remaining_quantity * batch.unit_cost,
      remaining_quantity: batch.remaining_quantity,
      unit: ingredient?.standard_unit ?? 'g',
      expiry_date: batch.expiry_date,
    });
  }

  return items.sort((a, b) => a.days_left - b.days_left || a.name.localeCompare(b.name));
}

function emptyTotals(): DailyTotals {
  return { usage: 0, waste: 0, shopping: 0, total: 0 };
}

/**
 * Per-day totals keyed YYYY-MM-DD. Days with nothing spent or wasted are absent.
 * total = usage + waste (money that left the pantry, not money spent at the store).
 */
export function dailyStats(
  usages: readonly UsageRecord[],
  events: readonly ShoppingEvent[]
): DailyStats {
  const data: DailyStats = {};
  const day = (date: string): DailyTotals => {
    if (!data[date]) {
      data[date] = emptyTotals();
    }
    return data[date];
  };

  for (const usage of usages) {
    const totals = day(usage.usage_date);
    totals.usage += usage.cost;
    totals.total += usage.cost;
  }

  for (const event of events) {
    if (event.total_cost <= 0 && event.total_waste <= 0) continue;
    const totals = day(event.date);
    totals.shopping += event.total_cost;
    totals.waste += event.total_waste;
    totals.total += event.total_waste;
  }

  return data;
}

export function summarizeMonth(daily: DailyStats, year: number, month: number): MonthlySummary {
  const summary: MonthlySummary = { year, month, ...emptyTotals() };
  for (const totals of Object.values(daily)) {
    summary.usage += totals.usage;
    summary.waste += totals.waste;
    summary.shopping += totals.shopping;
    summary.total += totals.total;
  }
  return summary;
}

export function groupByMeal(
  usages: readonly UsageRecord[],
  ingredients: ReadonlyMap<string, IngredientRecord>
): Record<string, MealGroup> {
  const grouped: Record<string, MealGroup> = {};
  for (const usage of usages) {
    if (!grouped[usage.meal_label]) {
      grouped[usage.meal_label] = { total: 0, items: [] };
    }
    const group = grouped[usage.meal_label];
    group.total += usage.cost;
    group.items.push({
      usage_id: usage.id,
      name: ingredients.get(usage.ingredient_id)?.name ?? '',
      amount: usage.input_label,
      cost: usage.cost,
    });
  }
  return grouped;
}

// =============================================================================
// ADAPTER-BACKED REPORTS
// =============================================================================

async function ingredientMap(
  db: LedgerAdapter,
  householdKey: string
): Promise<Map<string, IngredientRecord>> {
  const ingredients = await db.listIngredients(householdKey);
  return new Map(ingredients.map(i => [i.id, i]));
}

export async function getAssetValue(db: LedgerAdapter, householdKey: string): Promise<number> {
  return assetValue(await db.listStockedBatches(householdKey));
}

/**
 * @param windowDays - defaults to LEDGER_EXPIRING_WINDOW_DAYS
 * @param today - YYYY-MM-DD, defaults to the current UTC date
 */
export async function getExpiringSoon(
  db: LedgerAdapter,
  householdKey: string,
  windowDays: number = getFlags().expiringWindowDays,
  today: string = todayIso()
): Promise<ExpiringBatch[]> {
  if (!Number.isInteger(windowDays) || windowDays < 0) {
    throw invalidAmount(`windowDays must be a non-negative integer, got ${windowDays}`);
  }
  assertIsoDate(today, 'today');

  const [batches, ingredients] = await Promise.all([
    db.listStockedBatches(householdKey),
    ingredientMap(db, householdKey),
  ]);
  return expiringSoon(batches, ingredients, windowDays, today);
}

export async function getDailyStats(
  db: LedgerAdapter,
  householdKey: string,
  year: number,
  month: number
): Promise<DailyStats> {
  const range = monthRange(year, month);
  const [usages, events] = await Promise.all([
    db.listUsages(householdKey, range),
    db.listShoppingEvents(householdKey, range),
  ]);
  return dailyStats(usages, events);
}

export async function getMonthlySummary(
  db: LedgerAdapter,
  householdKey: string,
  year: number,
  month: number
): Promise<MonthlySummary> {
  return summarizeMonth(await getDailyStats(db, householdKey, year, month), year, month);
}

/**
 * Usages of one day grouped by meal label.
 */
export async function getDailyDetail(
  db: LedgerAdapter,
  householdKey: string,
  date: string
): Promise<Record<string, MealGroup>> {
  assertIsoDate(date, 'date');
  const [usages, ingredients] = await Promise.all([
    db.listUsages(householdKey, dayRange(date)),
    ingredientMap(db, householdKey),
  ]);
  return groupByMeal(usages, ingredients);
}

export async function getShoppingEventDetail(
  db: LedgerAdapter,
  householdKey: string,
  eventId: string
): Promise<ShoppingEventDetail> {
  const event = await db.getShoppingEvent(householdKey, eventId);
  if (!event) {
    throw notFound('shopping event', eventId);
  }
  const [batches, ingredients] = await Promise.all([
    db.listBatchesForEvent(householdKey, eventId),
    ingredientMap(db, householdKey),
  ]);

  return {
    id: event.id,
    date: event.date,
    location: event.location,
    total_cost: event.total_cost,
    total_waste: event.total_waste,
    items: batches.map(batch => ({
      batch_id: batch.id,
      name: ingredients.get(batch.ingredient_id)?.name ?? '',
      quantity: batch.quantity,
      remaining: batch.remaining_quantity,
      price: batch.quantity * batch.unit_cost,
      waste_cost: batch.discarded_cost,
      status: batch.status,
    })),
  };
}

export async function getDashboardSummary(
  db: LedgerAdapter,
  householdKey: string,
  today: string = todayIso()
): Promise<DashboardSummary> {
  assertIsoDate(today, 'today');
  const year = Number(today.slice(0, 4));
  const month = Number(today.slice(5, 7));

  const [asset, expiring, todayUsages, monthSummary, events] = await Promise.all([
    getAssetValue(db, householdKey),
    getExpiringSoon(db, householdKey, getFlags().expiringWindowDays, today),
    db.listUsages(householdKey, dayRange(today)),
    getMonthlySummary(db, householdKey, year, month),
    db.listShoppingEvents(householdKey),
  ]);

  return {
    assetValue: asset,
    expiring,
    todayUsageCost: todayUsages.reduce((sum, u) => sum + u.cost, 0),
    month: monthSummary,
    cumulativeWaste: events.reduce((sum, e) => sum + e.total_waste, 0),
  };
}
