/**
 * DB Client Tests
 *
 * In-memory adapter, transactions, readonly mode and the tenant guard.
 */

import {
  KeyedMutex,
  assertHouseholdScoped,
  clearDb,
  createInMemoryDb,
  getDb,
  hasHouseholdKeyPredicate,
  isDbReadonly,
  isRealDb,
  normalizeTimestamptz,
  requiresHouseholdKeyButMissing,
  resetDb,
  setDbReadonly,
} from '../db/client';
import { fifoOrderBy, isWriteStatement, tenantUpdateWhere, tenantWhere } from '../db/sql';
import { isReadonlyModeError } from '../errors';
import { createIngredient } from '../ledger/purchases';
import { getDurationSnapshot, getMetric, reset } from '../monitoring/metrics';
import { OTHER_HOUSEHOLD_KEY, TEST_HOUSEHOLD_KEY, seedBatch, seedIngredient } from './helpers';

describe('DB Client', () => {
  beforeEach(() => {
    reset();
    resetDb();
  });

  afterAll(() => {
    resetDb();
  });

  describe('getDb', () => {
    it('uses the in-memory adapter under test', async () => {
      const db = getDb();

      expect(db.name).toBe('inmemory');
      expect(isRealDb()).toBe(false);
      expect(await db.ping()).toBe(true);
      expect(getDb()).toBe(db);
    });

    it('clearDb empties the singleton and reseeds units', async () => {
      const db = getDb();
      await seedIngredient(db, 'rice');

      await clearDb();

      expect(await db.listIngredients(TEST_HOUSEHOLD_KEY)).toEqual([]);
      expect(await db.getUnitConversion('컵')).not.toBeNull();
    });

    it('toggles readonly mode on the singleton', () => {
      expect(isDbReadonly()).toBe(false);
      setDbReadonly(true);
      expect(isDbReadonly()).toBe(true);
      setDbReadonly(false);
      expect(isDbReadonly()).toBe(false);
    });
  });

  describe('transactions', () => {
    it('rolls back every write when the callback throws', async () => {
      const db = createInMemoryDb();
      const riceId = await seedIngredient(db, 'rice');

      await expect(
        db.transaction(async tx => {
          await tx.insertShoppingEvent({
            id: 'event-1',
            household_key: TEST_HOUSEHOLD_KEY,
            date: '2024-03-01',
            location: '',
            total_cost: 0,
            total_waste: 0,
            created_at: '2024-03-01T00:00:00.000Z',
          });
          await tx.addShoppingEventTotals(TEST_HOUSEHOLD_KEY, 'event-1', { cost: 100 });
          await tx.lockIngredient(TEST_HOUSEHOLD_KEY, riceId);
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await db.getShoppingEvent(TEST_HOUSEHOLD_KEY, 'event-1')).toBeNull();
    });

    it('releases ingredient locks when the transaction ends', async () => {
      const db = createInMemoryDb();
      const riceId = await seedIngredient(db, 'rice');

      await expect(
        db.transaction(async tx => {
          await tx.lockIngredient(TEST_HOUSEHOLD_KEY, riceId);
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      // Would hang if the lock were still held
      await db.transaction(tx => tx.lockIngredient(TEST_HOUSEHOLD_KEY, riceId));
    });

    it('holds an ingredient name until the first transaction commits', async () => {
      const db = createInMemoryDb();
      const order: string[] = [];
      let releaseFirst: () => void = () => undefined;
      const firstHolding = new Promise<void>(resolve => {
        releaseFirst = resolve;
      });

      const first = db.transaction(async tx => {
        await tx.lockIngredientName(TEST_HOUSEHOLD_KEY, 'milk');
        order.push('first');
        await firstHolding;
      });
      const second = db.transaction(async tx => {
        await tx.lockIngredientName(TEST_HOUSEHOLD_KEY, 'milk');
        order.push('second');
      });
      const otherHousehold = db.transaction(async tx => {
        await tx.lockIngredientName(OTHER_HOUSEHOLD_KEY, 'milk');
        order.push('other');
      });

      await otherHousehold;
      expect(order).toEqual(['first', 'other']);

      releaseFirst();
      await Promise.all([first, second]);
      expect(order).toEqual(['first', 'other', 'second']);
    });

    it('records how long each transaction took', async () => {
      const db = createInMemoryDb();

      await db.transaction(async () => undefined);

      expect(getDurationSnapshot().ledger_tx_ms?.count).toBe(1);
    });
  });

  describe('readonly mode', () => {
    it('rejects writes with readonly_mode', async () => {
      const db = createInMemoryDb(true);

      const error = await createIngredient(db, TEST_HOUSEHOLD_KEY, { name: 'rice' }).catch((e: unknown) => e);

      expect(isReadonlyModeError(error)).toBe(true);
      expect(getMetric('readonly_hit')).toBe(1);
      expect(await db.listIngredients(TEST_HOUSEHOLD_KEY)).toEqual([]);
    });

    it('still serves reads', async () => {
      const db = createInMemoryDb();
      const riceId = await seedIngredient(db, 'rice');
      db.setReadonlyMode(true);

      expect(db.isReadonly()).toBe(true);
      expect((await db.getIngredient(TEST_HOUSEHOLD_KEY, riceId))?.name).toBe('rice');
      await expect(seedBatch(db, riceId, 1, 1, '2024-03-01')).rejects.toMatchObject({
        code: 'readonly_mode',
      });
    });
  });

  describe('tenant isolation', () => {
    it('never returns another household\'s rows', async () => {
      const db = createInMemoryDb();
      const riceId = await seedIngredient(db, 'rice');
      const batchId = await seedBatch(db, riceId, 5, 1, '2024-03-01');

      expect(await db.getIngredient(OTHER_HOUSEHOLD_KEY, riceId)).toBeNull();
      expect(await db.getBatch(OTHER_HOUSEHOLD_KEY, batchId)).toBeNull();
      expect(await db.listStockedBatches(OTHER_HOUSEHOLD_KEY)).toEqual([]);
      expect(await db.listBatchesForIngredient(OTHER_HOUSEHOLD_KEY, riceId)).toEqual([]);
    });
  });

  describe('tenant guard', () => {
    it('detects the household predicate', () => {
      expect(hasHouseholdKeyPredicate('SELECT * FROM usages u WHERE u.household_key = $1')).toBe(true);
      expect(hasHouseholdKeyPredicate('SELECT * FROM usages u WHERE u.household_key = $2')).toBe(false);
    });

    it('flags tenant-table queries without it', () => {
      expect(requiresHouseholdKeyButMissing('SELECT * FROM purchase_batches WHERE id = $1')).toBe(true);
      expect(requiresHouseholdKeyButMissing('INSERT INTO usages (id) VALUES ($1)')).toBe(false);
      expect(requiresHouseholdKeyButMissing('SELECT * FROM unit_conversions')).toBe(false);
    });

    it('throws tenant_predicate_missing', () => {
      expect(() => assertHouseholdScoped('DELETE FROM usages WHERE id = $2')).toThrow(
        'tenant_predicate_missing'
      );
      expect(() =>
        assertHouseholdScoped(`DELETE FROM usages ${tenantUpdateWhere()} AND id = $2`)
      ).not.toThrow();
    });
  });

  describe('sql helpers', () => {
    it('builds tenant fragments', () => {
      expect(tenantWhere('pb')).toBe('pb.household_key = $1');
      expect(tenantWhere()).toBe('household_key = $1');
      expect(tenantUpdateWhere('pb')).toBe('WHERE pb.household_key = $1');
      expect(tenantUpdateWhere()).toBe('WHERE household_key = $1');
    });

    it('orders batches FIFO with expiry nulls last', () => {
      expect(fifoOrderBy('pb')).toBe(
        'ORDER BY pb.purchase_date ASC, pb.expiry_date ASC NULLS LAST, pb.created_at ASC, pb.id ASC'
      );
    });

    it('recognizes write statements', () => {
      expect(isWriteStatement('  UPDATE purchase_batches SET status = $2')).toBe(true);
      expect(isWriteStatement('SELECT 1')).toBe(false);
    });
  });

  describe('normalizeTimestamptz', () => {
    it('converts Postgres text timestamps to UTC ISO strings', () => {
      expect(normalizeTimestamptz('2024-03-01 00:00:00+00')).toBe('2024-03-01T00:00:00.000Z');
      expect(normalizeTimestamptz('2024-03-01 09:30:00.25+09')).toBe('2024-03-01T00:30:00.250Z');
      expect(normalizeTimestamptz('2024-03-01 00:00:00-05:30')).toBe('2024-03-01T05:30:00.000Z');
    });

    it('passes other values through', () => {
      expect(normalizeTimestamptz('infinity')).toBe('infinity');
      expect(normalizeTimestamptz('2024-03-01T00:00:00.000Z')).toBe('2024-03-01T00:00:00.000Z');
    });
  });

  describe('KeyedMutex', () => {
    it('hands the key to waiters in order', async () => {
      const mutex = new KeyedMutex();
      const order: string[] = [];

      const releaseFirst = await mutex.acquire('rice');
      expect(mutex.isLocked('rice')).toBe(true);

      const second = mutex.acquire('rice').then(release => {
        order.push('second');
        release();
      });
      order.push('first');
      releaseFirst();
      await second;

      expect(order).toEqual(['first', 'second']);
      expect(mutex.isLocked('rice')).toBe(false);
    });

    it('does not block other keys', async () => {
      const mutex = new KeyedMutex();
      const releaseRice = await mutex.acquire('rice');

      const releaseSalt = await mutex.acquire('salt');
      releaseSalt();
      releaseRice();

      expect(mutex.isLocked('salt')).toBe(false);
    });
  });
});
