/**
 * Aggregates Tests
 *
 * Ledger used throughout:
 * - 2024-03-01 trip: milk 1000ml for 3000 (exp 03-10), egg 10 for 5000 (exp 03-13)
 * - 2024-03-02 tofu 2 @ 1000 outside any trip (exp 03-09)
 * - 2024-03-15 trip: flour 1000g for 2000 (no expiry)
 * - usages: milk 200 + egg 2 on 03-05, flour 100 on 03-20, flour 50 on 04-01
 * - 3 eggs discarded (1500, attributed to the 03-01 trip)
 */

import { createInMemoryDb, type LedgerAdapter } from '../db/client';
import { recordShoppingTrip } from '../ledger/purchases';
import { recordUsage } from '../ledger/usage';
import { discard } from '../ledger/waste';
import {
  dailyStats,
  getAssetValue,
  getDailyDetail,
  getDailyStats,
  getDashboardSummary,
  getExpiringSoon,
  getMonthlySummary,
  getShoppingEventDetail,
} from '../reports';
import { TEST_HOUSEHOLD_KEY, seedBatch, seedIngredient } from './helpers';

describe('Aggregates', () => {
  let db: LedgerAdapter;
  let firstTripId: string;
  let milkBatch: string;
  let eggBatch: string;
  let tofuBatch: string;
  let breakfastUsage: string;
  let dinnerUsage: string;

  beforeEach(async () => {
    db = createInMemoryDb();

    const first = await recordShoppingTrip(db, TEST_HOUSEHOLD_KEY, {
      date: '2024-03-01',
      items: [
        { name: 'milk', quantity: 1000, unit: 'ml', price: 3000, expiryDate: '2024-03-10' },
        { name: 'egg', quantity: 10, unit: 'count', price: 5000, expiryDate: '2024-03-13' },
      ],
    });
    firstTripId = first.shoppingEventId;
    [milkBatch, eggBatch] = first.batchIds;

    const tofuId = await seedIngredient(db, 'tofu', 'count');
    tofuBatch = await seedBatch(db, tofuId, 2, 1000, '2024-03-02', { expiryDate: '2024-03-09' });

    await recordShoppingTrip(db, TEST_HOUSEHOLD_KEY, {
      date: '2024-03-15',
      items: [{ name: 'flour', quantity: 1000, unit: 'g', price: 2000 }],
    });

    const ids = new Map((await db.listIngredients(TEST_HOUSEHOLD_KEY)).map(i => [i.name, i.id]));
    const idOf = (name: string): string => {
      const id = ids.get(name);
      if (!id) throw new Error(`missing ingredient ${name}`);
      return id;
    };

    breakfastUsage = (
      await recordUsage(db, TEST_HOUSEHOLD_KEY, {
        ingredientId: idOf('milk'),
        usageDate: '2024-03-05',
        mealLabel: 'breakfast',
        amount: 200,
      })
    ).usageId;
    dinnerUsage = (
      await recordUsage(db, TEST_HOUSEHOLD_KEY, {
        ingredientId: idOf('egg'),
        usageDate: '2024-03-05',
        mealLabel: 'dinner',
        amount: 2,
      })
    ).usageId;
    await recordUsage(db, TEST_HOUSEHOLD_KEY, {
      ingredientId: idOf('flour'),
      usageDate: '2024-03-20',
      mealLabel: 'dinner',
      amount: 100,
    });
    await recordUsage(db, TEST_HOUSEHOLD_KEY, {
      ingredientId: idOf('flour'),
      usageDate: '2024-04-01',
      mealLabel: 'lunch',
      amount: 50,
    });

    await discard(db, TEST_HOUSEHOLD_KEY, eggBatch, 3);
  });

  it('values remaining stock at unit cost', async () => {
    // milk 800×3 + egg 5×500 + flour 850×2 + tofu 2×1000
    expect(await getAssetValue(db, TEST_HOUSEHOLD_KEY)).toBe(8600);
  });

  describe('getExpiringSoon', () => {
    it('lists stocked batches inside the window, soonest first, skipping expired ones', async () => {
      const expiring = await getExpiringSoon(db, TEST_HOUSEHOLD_KEY, 3, '2024-03-10');

      expect(expiring).toEqual([
        {
          batch_id: milkBatch,
          ingredient_id: expect.any(String),
          name: 'milk',
          days_left: 0,
          potential_loss: 2400,
          remaining_quantity: 800,
          unit: 'ml',
          expiry_date: '2024-03-10',
        },
        {
          batch_id: eggBatch,
          ingredient_id: expect.any(String),
          name: 'egg',
          days_left: 3,
          potential_loss: 2500,
          remaining_quantity: 5,
          unit: 'count',
          expiry_date: '2024-03-13',
        },
      ]);
    });

    it('narrows with the window', async () => {
      const expiring = await getExpiringSoon(db, TEST_HOUSEHOLD_KEY, 2, '2024-03-07');
      expect(expiring.map(e => [e.batch_id, e.days_left])).toEqual([[tofuBatch, 2]]);
    });

    it('rejects a negative window', async () => {
      await expect(getExpiringSoon(db, TEST_HOUSEHOLD_KEY, -1, '2024-03-07')).rejects.toMatchObject({
        code: 'invalid_amount',
      });
    });
  });

  describe('daily and monthly rollups', () => {
    it('attributes usage to its date and shopping and waste to the event date', async () => {
      const daily = await getDailyStats(db, TEST_HOUSEHOLD_KEY, 2024, 3);

      expect(daily).toEqual({
        '2024-03-01': { usage: 0, waste: 1500, shopping: 8000, total: 1500 },
        '2024-03-05': { usage: 1600, waste: 0, shopping: 0, total: 1600 },
        '2024-03-15': { usage: 0, waste: 0, shopping: 2000, total: 0 },
        '2024-03-20': { usage: 200, waste: 0, shopping: 0, total: 200 },
      });
    });

    it('monthly summary equals the sum of the dailies', async () => {
      const daily = await getDailyStats(db, TEST_HOUSEHOLD_KEY, 2024, 3);
      const summary = await getMonthlySummary(db, TEST_HOUSEHOLD_KEY, 2024, 3);

      const days = Object.values(daily);
      expect(summary.usage).toBe(days.reduce((s, d) => s + d.usage, 0));
      expect(summary.waste).toBe(days.reduce((s, d) => s + d.waste, 0));
      expect(summary).toEqual({ year: 2024, month: 3, usage: 1800, waste: 1500, shopping: 10000, total: 3300 });
    });

    it('keeps other months out', async () => {
      expect(await getMonthlySummary(db, TEST_HOUSEHOLD_KEY, 2024, 4)).toEqual({
        year: 2024,
        month: 4,
        usage: 100,
        waste: 0,
        shopping: 0,
        total: 100,
      });
    });

    it('rejects an invalid month', async () => {
      await expect(getDailyStats(db, TEST_HOUSEHOLD_KEY, 2024, 13)).rejects.toMatchObject({
        code: 'invalid_amount',
      });
    });

    it('skips events with nothing spent or wasted', () => {
      const stats = dailyStats([], [
        {
          id: 'e1',
          household_key: TEST_HOUSEHOLD_KEY,
          date: '2024-03-02',
          location: '',
          total_cost: 0,
          total_waste: 0,
          created_at: '2024-03-02T00:00:00.000Z',
        },
      ]);
      expect(stats).toEqual({});
    });
  });

  it('groups a day\'s usages by meal label', async () => {
    const detail = await getDailyDetail(db, TEST_HOUSEHOLD_KEY, '2024-03-05');

    expect(detail).toEqual({
      breakfast: {
        total: 600,
        items: [{ usage_id: breakfastUsage, name: 'milk', amount: '200 ml', cost: 600 }],
      },
      dinner: {
        total: 1000,
        items: [{ usage_id: dinnerUsage, name: 'egg', amount: '2 count', cost: 1000 }],
      },
    });
  });

  it('details a shopping event with its batches', async () => {
    const detail = await getShoppingEventDetail(db, TEST_HOUSEHOLD_KEY, firstTripId);

    expect(detail.total_cost).toBe(8000);
    expect(detail.total_waste).toBe(1500);
    expect(detail.items).toEqual([
      { batch_id: milkBatch, name: 'milk', quantity: 1000, remaining: 800, price: 3000, waste_cost: 0, status: 'active' },
      { batch_id: eggBatch, name: 'egg', quantity: 10, remaining: 5, price: 5000, waste_cost: 1500, status: 'active' },
    ]);
  });

  it('fails with not_found for an unknown shopping event', async () => {
    await expect(getShoppingEventDetail(db, TEST_HOUSEHOLD_KEY, 'nope')).rejects.toMatchObject({
      code: 'not_found',
    });
  });

  it('summarizes the dashboard for a day', async () => {
    const summary = await getDashboardSummary(db, TEST_HOUSEHOLD_KEY, '2024-03-05');

    expect(summary.assetValue).toBe(8600);
    expect(summary.expiring).toEqual([]);
    expect(summary.todayUsageCost).toBe(1600);
    expect(summary.month.usage).toBe(1800);
    expect(summary.cumulativeWaste).toBe(1500);
  });
});
