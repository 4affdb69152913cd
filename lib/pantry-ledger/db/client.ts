/**
 * Database Client for the Pantry Ledger
 *
 * Supports two adapters:
 * - InMemory: For tests and local development
 * - Postgres: For staging and production (requires DATABASE_URL)
 *
 * Selection logic:
 * - NODE_ENV=test: Always InMemory
 * - DATABASE_URL present: Postgres
 * - Otherwise: InMemory with warning
 *
 * Transactions:
 * - All writes go through adapter.transaction(fn); reads may use the adapter directly
 * - tx.lockIngredient() serializes writers per ingredient until the transaction ends
 * - tx.lockIngredientName() does the same for find-or-create by name
 * - A throw inside fn rolls back every write made through tx
 *
 * Readonly Mode:
 * - Every write method throws LedgerError('readonly_mode')
 */

import { Pool, types, type PoolClient, type QueryResultRow } from 'pg';
import type {
  BatchUpdate,
  IngredientRecord,
  PurchaseBatch,
  ShoppingEvent,
  UnitConversion,
  UsageAllocation,
  UsageRecord,
} from '../../../types/pantry-ledger';
import { LedgerError } from '../errors';
import { getFlags } from '../config/flags';
import { compareFifo } from '../ledger/fifo';
import { record, recordDuration } from '../monitoring/metrics';
import { DEFAULT_UNIT_CONVERSIONS } from '../units';
import { TABLE_ALIASES, fifoOrderBy, isWriteStatement, tenantUpdateWhere, tenantWhere } from './sql';

// =============================================================================
// ADAPTER INTERFACE
// =============================================================================

/**
 * Half-open date range: start <= date < end (YYYY-MM-DD)
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Read side. householdKey is ALWAYS the first parameter for tenant data.
 * Batch lists come back in FIFO order.
 */
export interface LedgerReader {
  getIngredient(householdKey: string, id: string): Promise<IngredientRecord | null>;
  getIngredientByName(householdKey: string, name: string): Promise<IngredientRecord | null>;
  listIngredients(householdKey: string): Promise<IngredientRecord[]>;

  getBatch(householdKey: string, id: string): Promise<PurchaseBatch | null>;
  listBatchesForIngredient(householdKey: string, ingredientId: string): Promise<PurchaseBatch[]>;
  listStockedBatches(householdKey: string): Promise<PurchaseBatch[]>;
  listBatchesForEvent(householdKey: string, shoppingEventId: string): Promise<PurchaseBatch[]>;

  getShoppingEvent(householdKey: string, id: string): Promise<ShoppingEvent | null>;
  listShoppingEvents(householdKey: string, range?: DateRange): Promise<ShoppingEvent[]>;

  getUsage(householdKey: string, id: string): Promise<UsageRecord | null>;
  listUsages(householdKey: string, range?: DateRange): Promise<UsageRecord[]>;

  // Unit conversions are global reference data (not tenant-scoped)
  getUnitConversion(unitName: string): Promise<UnitConversion | null>;
  listUnitConversions(): Promise<UnitConversion[]>;
}

/**
 * Write side, only reachable inside adapter.transaction().
 */
export interface LedgerTx extends LedgerReader {
  lockIngredient(householdKey: string, ingredientId: string): Promise<void>;
  /** Serializes creation of an ingredient name within a household. */
  lockIngredientName(householdKey: string, name: string): Promise<void>;

  insertIngredient(ingredient: IngredientRecord): Promise<void>;
  insertShoppingEvent(event: ShoppingEvent): Promise<void>;
  /** Additive: total_cost += cost, total_waste += waste */
  addShoppingEventTotals(
    householdKey: string,
    id: string,
    delta: { cost?: number; waste?: number }
  ): Promise<void>;

  insertBatch(batch: PurchaseBatch): Promise<void>;
  updateBatch(householdKey: string, id: string, update: BatchUpdate): Promise<void>;

  insertUsage(usage: UsageRecord): Promise<void>;
  /** @returns false if no such usage */
  deleteUsage(householdKey: string, id: string): Promise<boolean>;

  upsertUnitConversion(conversion: UnitConversion): Promise<void>;
  /** @returns false if `from` does not exist */
  renameUnitConversion(from: string, to: string): Promise<boolean>;
  /** Rewrites "<amount> <from>" labels to "<amount> <to>"; returns rows changed */
  rewriteUsageUnitLabels(householdKey: string, from: string, to: string): Promise<number>;
}

export interface LedgerAdapter extends LedgerReader {
  name: string;

  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T>;

  setReadonlyMode(enabled: boolean): void;
  isReadonly(): boolean;

  // Health check
  ping(): Promise<boolean>;
  close(): Promise<void>;

  // Cleanup (for tests)
  clearAll?(): Promise<void>;
}

// =============================================================================
// TENANT ISOLATION GUARD
// =============================================================================

/**
 * Check if SQL has the household_key = $1 predicate
 */
export function hasHouseholdKeyPredicate(sql: string): boolean {
  return /household_key\s*=\s*\$1\b/i.test(sql);
}

/**
 * Returns true if the statement reads or writes a tenant table without
 * the household predicate. INSERTs carry household_key as a column value.
 */
export function requiresHouseholdKeyButMissing(sql: string): boolean {
  const normalized = sql.toLowerCase();
  if (normalized.trim().startsWith('insert')) {
    return false;
  }
  const touchesTenantTable = Object.keys(TABLE_ALIASES).some(table =>
    new RegExp(`\\b${table}\\b`).test(normalized)
  );
  return touchesTenantTable && !hasHouseholdKeyPredicate(sql);
}

/**
 * Runtime guard against cross-tenant data leakage
 */
export function assertHouseholdScoped(sql: string): void {
  if (requiresHouseholdKeyButMissing(sql)) {
    throw new Error(`tenant_predicate_missing: ${sql.trim().substring(0, 80)}`);
  }
}

// =============================================================================
// PER-INGREDIENT MUTEX (in-process)
// =============================================================================

/**
 * FIFO async mutex keyed by string. acquire() resolves once every earlier
 * holder of the same key has released.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

function lockKey(householdKey: string, ingredientId: string): string {
  return `${householdKey}:${ingredientId}`;
}

function nameLockKey(householdKey: string, name: string): string {
  return `${householdKey}:name:${name}`;
}

function inRange(date: string, range?: DateRange): boolean {
  if (!range) return true;
  return date >= range.start && date < range.end;
}

function copyUsage(usage: UsageRecord): UsageRecord {
  return {
    ...usage,
    allocations: usage.allocations ? usage.allocations.map(a => ({ ...a })) : null,
  };
}

function assertWritable(readonlyMode: boolean): void {
  if (readonlyMode) {
    record('readonly_hit');
    throw new LedgerError('readonly_mode');
  }
}

// =============================================================================
// IN-MEMORY ADAPTER (for tests)
// =============================================================================

/**
 * Plain maps keyed by id. Batch insertion order is kept so ties on
 * (purchase_date, expiry_date) resolve oldest-inserted first.
 */
class InMemoryStore {
  ingredients: Map<string, IngredientRecord> = new Map();
  shoppingEvents: Map<string, ShoppingEvent> = new Map();
  batches: Map<string, PurchaseBatch> = new Map();
  usages: Map<string, UsageRecord> = new Map();
  units: Map<string, UnitConversion> = new Map();

  constructor() {
    this.seedUnits();
  }

  seedUnits(): void {
    for (const unit of DEFAULT_UNIT_CONVERSIONS) {
      this.units.set(unit.unit_name, { ...unit });
    }
  }

  clear(): void {
    this.ingredients.clear();
    this.shoppingEvents.clear();
    this.batches.clear();
    this.usages.clear();
    this.units.clear();
    this.seedUnits();
  }
}

class InMemoryReader implements LedgerReader {
  constructor(protected store: InMemoryStore) {}

  // Household-first: only return if household matches (tenant isolation)
  async getIngredient(householdKey: string, id: string): Promise<IngredientRecord | null> {
    const ingredient = this.store.ingredients.get(id);
    if (ingredient && ingredient.household_key === householdKey) {
      return { ...ingredient };
    }
    return null;
  }

  async getIngredientByName(householdKey: string, name: string): Promise<IngredientRecord | null> {
    for (const ingredient of this.store.ingredients.values()) {
      if (ingredient.household_key === householdKey && ingredient.name === name) {
        return { ...ingredient };
      }
    }
    return null;
  }

  async listIngredients(householdKey: string): Promise<IngredientRecord[]> {
    return Array.from(this.store.ingredients.values())
      .filter(i => i.household_key === householdKey)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(i => ({ ...i }));
  }

  async getBatch(householdKey: string, id: string): Promise<PurchaseBatch | null> {
    const batch = this.store.batches.get(id);
    if (batch && batch.household_key === householdKey) {
      return { ...batch };
    }
    return null;
  }

  private listBatches(predicate: (batch: PurchaseBatch) => boolean): PurchaseBatch[] {
    // Array.prototype.sort is stable: ties keep insertion order
    return Array.from(this.store.batches.values())
      .filter(predicate)
      .sort(compareFifo)
      .map(b => ({ ...b }));
  }

  async listBatchesForIngredient(householdKey: string, ingredientId: string): Promise<PurchaseBatch[]> {
    return this.listBatches(b => b.household_key === householdKey && b.ingredient_id === ingredientId);
  }

  async listStockedBatches(householdKey: string): Promise<PurchaseBatch[]> {
    return this.listBatches(b => b.household_key === householdKey && b.remaining_quantity > 0);
  }

  async listBatchesForEvent(householdKey: string, shoppingEventId: string): Promise<PurchaseBatch[]> {
    return this.listBatches(
      b => b.household_key === householdKey && b.shopping_event_id === shoppingEventId
    );
  }

  async getShoppingEvent(householdKey: string, id: string): Promise<ShoppingEvent | null> {
    const event = this.store.shoppingEvents.get(id);
    if (event && event.household_key === householdKey) {
      return { ...event };
    }
    return null;
  }

  async listShoppingEvents(householdKey: string, range?: DateRange): Promise<ShoppingEvent[]> {
    return Array.from(this.store.shoppingEvents.values())
      .filter(e => e.household_key === householdKey && inRange(e.date, range))
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(e => ({ ...e }));
  }

  async getUsage(householdKey: string, id: string): Promise<UsageRecord | null> {
    const usage = this.store.usages.get(id);
    if (usage && usage.household_key === householdKey) {
      return copyUsage(usage);
    }
    return null;
  }

  async listUsages(householdKey: string, range?: DateRange): Promise<UsageRecord[]> {
    return Array.from(this.store.usages.values())
      .filter(u => u.household_key === householdKey && inRange(u.usage_date, range))
      .sort((a, b) => a.usage_date.localeCompare(b.usage_date))
      .map(copyUsage);
  }

  async getUnitConversion(unitName: string): Promise<UnitConversion | null> {
    const unit = this.store.units.get(unitName);
    return unit ? { ...unit } : null;
  }

  async listUnitConversions(): Promise<UnitConversion[]> {
    return Array.from(this.store.units.values())
      .sort((a, b) => a.unit_name.localeCompare(b.unit_name))
      .map(u => ({ ...u }));
  }
}

/**
 * Writes apply to the shared store immediately and push an undo step.
 * On failure the steps run in reverse. Absolute restores are only used for
 * rows under this transaction's ingredient lock; shared counters (event
 * totals) are undone by applying the negated delta.
 */
class InMemoryTransaction extends InMemoryReader implements LedgerTx {
  private undoLog: Array<() => void> = [];
  private releases: Array<() => void> = [];
  private heldLocks: Set<string> = new Set();

  constructor(
    store: InMemoryStore,
    private mutex: KeyedMutex,
    private readonlyMode: boolean
  ) {
    super(store);
  }

  async lockIngredient(householdKey: string, ingredientId: string): Promise<void> {
    await this.acquire(lockKey(householdKey, ingredientId));
  }

  async lockIngredientName(householdKey: string, name: string): Promise<void> {
    await this.acquire(nameLockKey(householdKey, name));
  }

  private async acquire(key: string): Promise<void> {
    if (this.heldLocks.has(key)) return;
    const release = await this.mutex.acquire(key);
    this.heldLocks.add(key);
    this.releases.push(release);
  }

  async insertIngredient(ingredient: IngredientRecord): Promise<void> {
    assertWritable(this.readonlyMode);
    for (const existing of this.store.ingredients.values()) {
      if (existing.household_key === ingredient.household_key && existing.name === ingredient.name) {
        throw new LedgerError('invalid_amount', `duplicate ingredient name: ${ingredient.name}`);
      }
    }
    this.store.ingredients.set(ingredient.id, { ...ingredient });
    this.undoLog.push(() => this.store.ingredients.delete(ingredient.id));
  }

  async insertShoppingEvent(event: ShoppingEvent): Promise<void> {
    assertWritable(this.readonlyMode);
    this.store.shoppingEvents.set(event.id, { ...event });
    this.undoLog.push(() => this.store.shoppingEvents.delete(event.id));
  }

  async addShoppingEventTotals(
    householdKey: string,
    id: string,
    delta: { cost?: number; waste?: number }
  ): Promise<void> {
    assertWritable(this.readonlyMode);
    const event = this.store.shoppingEvents.get(id);
    if (!event || event.household_key !== householdKey) {
      return;
    }
    const cost = delta.cost ?? 0;
    const waste = delta.waste ?? 0;
    event.total_cost += cost;
    event.total_waste += waste;
    this.undoLog.push(() => {
      const current = this.store.shoppingEvents.get(id);
      if (current) {
        current.total_cost -= cost;
        current.total_waste -= waste;
      }
    });
  }

  async insertBatch(batch: PurchaseBatch): Promise<void> {
    assertWritable(this.readonlyMode);
    this.store.batches.set(batch.id, { ...batch });
    this.undoLog.push(() => this.store.batches.delete(batch.id));
  }

  async updateBatch(householdKey: string, id: string, update: BatchUpdate): Promise<void> {
    assertWritable(this.readonlyMode);
    const batch = this.store.batches.get(id);
    if (!batch || batch.household_key !== householdKey) {
      return;
    }
    const before: BatchUpdate = {
      remaining_quantity: batch.remaining_quantity,
      discarded_quantity: batch.discarded_quantity,
      discarded_cost: batch.discarded_cost,
      status: batch.status,
    };
    Object.assign(batch, update);
    this.undoLog.push(() => {
      const current = this.store.batches.get(id);
      if (current) {
        Object.assign(current, before);
      }
    });
  }

  async insertUsage(usage: UsageRecord): Promise<void> {
    assertWritable(this.readonlyMode);
    this.store.usages.set(usage.id, copyUsage(usage));
    this.undoLog.push(() => this.store.usages.delete(usage.id));
  }

  async deleteUsage(householdKey: string, id: string): Promise<boolean> {
    assertWritable(this.readonlyMode);
    const usage = this.store.usages.get(id);
    if (!usage || usage.household_key !== householdKey) {
      return false;
    }
    this.store.usages.delete(id);
    this.undoLog.push(() => this.store.usages.set(id, usage));
    return true;
  }

  async upsertUnitConversion(conversion: UnitConversion): Promise<void> {
    assertWritable(this.readonlyMode);
    const previous = this.store.units.get(conversion.unit_name);
    this.store.units.set(conversion.unit_name, { ...conversion });
    this.undoLog.push(() => {
      if (previous) {
        this.store.units.set(conversion.unit_name, previous);
      } else {
        this.store.units.delete(conversion.unit_name);
      }
    });
  }

  async renameUnitConversion(from: string, to: string): Promise<boolean> {
    assertWritable(this.readonlyMode);
    const unit = this.store.units.get(from);
    if (!unit) return false;
    if (this.store.units.has(to)) {
      throw new Error(`unit already exists: ${to}`);
    }
    this.store.units.delete(from);
    this.store.units.set(to, { ...unit, unit_name: to });
    this.undoLog.push(() => {
      this.store.units.delete(to);
      this.store.units.set(from, unit);
    });
    return true;
  }

  async rewriteUsageUnitLabels(householdKey: string, from: string, to: string): Promise<number> {
    assertWritable(this.readonlyMode);
    const suffix = ` ${from}`;
    let changed = 0;
    for (const usage of this.store.usages.values()) {
      if (usage.household_key !== householdKey || !usage.input_label.endsWith(suffix)) {
        continue;
      }
      const previous = usage.input_label;
      usage.input_label = `${previous.slice(0, previous.length - from.length)}${to}`;
      this.undoLog.push(() => {
        usage.input_label = previous;
      });
      changed++;
    }
    return changed;
  }

  rollback(): void {
    for (let i = this.undoLog.length - 1; i >= 0; i--) {
      this.undoLog[i]();
    }
    this.undoLog = [];
  }

  releaseLocks(): void {
    for (const release of this.releases) {
      release();
    }
    this.releases = [];
    this.heldLocks.clear();
  }
}

class InMemoryAdapter extends InMemoryReader implements LedgerAdapter {
  name = 'inmemory';

  private mutex = new KeyedMutex();
  private _readonlyMode: boolean;

  constructor(readonlyMode: boolean = false) {
    super(new InMemoryStore());
    this._readonlyMode = readonlyMode;
  }

  setReadonlyMode(enabled: boolean): void {
    this._readonlyMode = enabled;
  }

  isReadonly(): boolean {
    return this._readonlyMode;
  }

  async transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    const tx = new InMemoryTransaction(this.store, this.mutex, this._readonlyMode);
    try {
      const result = await fn(tx);
      return result;
    } catch (error) {
      tx.rollback();
      throw error;
    } finally {
      tx.releaseLocks();
      recordDuration('ledger_tx_ms', Date.now() - startedAt);
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  async clearAll(): Promise<void> {
    this.store.clear();
  }
}

// =============================================================================
// POSTGRES ADAPTER (for production)
// =============================================================================

const PG_TIMESTAMPTZ_TEXT = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}(?:\.\d+)?)([+-]\d{2})(?::(\d{2}))?$/;

/**
 * Postgres text form (`2024-03-01 09:30:00+09`) to the ISO form the
 * in-memory adapter stores (`2024-03-01T00:30:00.000Z`). Anything else,
 * such as 'infinity', passes through.
 */
export function normalizeTimestamptz(value: string): string {
  const match = PG_TIMESTAMPTZ_TEXT.exec(value);
  if (!match) {
    return value;
  }
  const [, date, time, offsetHours, offsetMinutes] = match;
  return new Date(`${date}T${time}${offsetHours}:${offsetMinutes ?? '00'}`).toISOString();
}

// DATE stays text; TIMESTAMPTZ becomes ISO text so rows match the in-memory shapes
const PG_DATE_OID = 1082;
const PG_TIMESTAMPTZ_OID = 1184;
types.setTypeParser(PG_DATE_OID, (value: string) => value);
types.setTypeParser(PG_TIMESTAMPTZ_OID, normalizeTimestamptz);

const BATCH_COLUMNS = `pb.id, pb.household_key, pb.ingredient_id, pb.shopping_event_id, pb.purchase_date,
  pb.expiry_date, pb.quantity, pb.remaining_quantity, pb.unit_cost, pb.discarded_quantity,
  pb.discarded_cost, pb.status, pb.created_at`;

interface UsageRow {
  id: string;
  household_key: string;
  ingredient_id: string;
  usage_date: string;
  meal_label: string;
  input_label: string;
  quantity: number;
  cost: number;
  uncosted_quantity: number;
  traced: boolean;
  created_at: string;
}

interface UsageAllocationRow {
  usage_id: string;
  batch_id: string;
  quantity: number;
}

/**
 * Shared SELECTs. Subclasses decide whether queries run on the pool
 * or on the client holding the open transaction.
 */
abstract class PostgresReader implements LedgerReader {
  protected abstract run<R extends QueryResultRow>(sql: string, params?: unknown[]): Promise<R[]>;

  protected async exec<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<R[]> {
    // TENANT ISOLATION: runtime guard before anything reaches the server
    assertHouseholdScoped(sql);
    try {
      return await this.run<R>(sql, params);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error('[DB] Query failed:', message);
      throw new Error(`Database query failed: ${message}`);
    }
  }

  async getIngredient(householdKey: string, id: string): Promise<IngredientRecord | null> {
    const rows = await this.exec<IngredientRecord>(
      `SELECT * FROM ingredients WHERE ${tenantWhere()} AND id = $2 LIMIT 1`,
      [householdKey, id]
    );
    return rows[0] ?? null;
  }

  async getIngredientByName(householdKey: string, name: string): Promise<IngredientRecord | null> {
    const rows = await this.exec<IngredientRecord>(
      `SELECT * FROM ingredients WHERE ${tenantWhere()} AND name = $2 LIMIT 1`,
      [householdKey, name]
    );
    return rows[0] ?? null;
  }

  async listIngredients(householdKey: string): Promise<IngredientRecord[]> {
    return this.exec<IngredientRecord>(
      `SELECT * FROM ingredients WHERE ${tenantWhere()} ORDER BY name`,
      [householdKey]
    );
  }

  async getBatch(householdKey: string, id: string): Promise<PurchaseBatch | null> {
    const rows = await this.exec<PurchaseBatch>(
      `SELECT ${BATCH_COLUMNS} FROM purchase_batches pb WHERE ${tenantWhere('pb')} AND pb.id = $2 LIMIT 1`,
      [householdKey, id]
    );
    return rows[0] ?? null;
  }

  async listBatchesForIngredient(householdKey: string, ingredientId: string): Promise<PurchaseBatch[]> {
    return this.exec<PurchaseBatch>(
      `SELECT ${BATCH_COLUMNS} FROM purchase_batches pb
       WHERE ${tenantWhere('pb')} AND pb.ingredient_id = $2
       ${fifoOrderBy('pb')}`,
      [householdKey, ingredientId]
    );
  }

  async listStockedBatches(householdKey: string): Promise<PurchaseBatch[]> {
    return this.exec<PurchaseBatch>(
      `SELECT ${BATCH_COLUMNS} FROM purchase_batches pb
       WHERE ${tenantWhere('pb')} AND pb.remaining_quantity > 0
       ${fifoOrderBy('pb')}`,
      [householdKey]
    );
  }

  async listBatchesForEvent(householdKey: string, shoppingEventId: string): Promise<PurchaseBatch[]> {
    return this.exec<PurchaseBatch>(
      `SELECT ${BATCH_COLUMNS} FROM purchase_batches pb
       WHERE ${tenantWhere('pb')} AND pb.shopping_event_id = $2
       ${fifoOrderBy('pb')}`,
      [householdKey, shoppingEventId]
    );
  }

  async getShoppingEvent(householdKey: string, id: string): Promise<ShoppingEvent | null> {
    const rows = await this.exec<ShoppingEvent>(
      `SELECT * FROM shopping_events WHERE ${tenantWhere()} AND id = $2 LIMIT 1`,
      [householdKey, id]
    );
    return rows[0] ?? null;
  }

  async listShoppingEvents(householdKey: string, range?: DateRange): Promise<ShoppingEvent[]> {
    if (range) {
      return this.exec<ShoppingEvent>(
        `SELECT * FROM shopping_events WHERE ${tenantWhere()} AND date >= $2 AND date < $3 ORDER BY date, created_at`,
        [householdKey, range.start, range.end]
      );
    }
    return this.exec<ShoppingEvent>(
      `SELECT * FROM shopping_events WHERE ${tenantWhere()} ORDER BY date, created_at`,
      [householdKey]
    );
  }

  private async attachAllocations(householdKey: string, rows: UsageRow[]): Promise<UsageRecord[]> {
    const tracedIds = rows.filter(r => r.traced).map(r => r.id);
    const byUsage = new Map<string, UsageAllocation[]>();

    if (tracedIds.length > 0) {
      const allocationRows = await this.exec<UsageAllocationRow>(
        `SELECT usage_id, batch_id, quantity FROM usage_allocations
         WHERE ${tenantWhere()} AND usage_id = ANY($2)
         ORDER BY usage_id, position`,
        [householdKey, tracedIds]
      );
      for (const row of allocationRows) {
        const list = byUsage.get(row.usage_id) ?? [];
        list.push({ batch_id: row.batch_id, quantity: row.quantity });
        byUsage.set(row.usage_id, list);
      }
    }

    return rows.map(({ traced, ...usage }) => ({
      ...usage,
      allocations: traced ? byUsage.get(usage.id) ?? [] : null,
    }));
  }

  async getUsage(householdKey: string, id: string): Promise<UsageRecord | null> {
    const rows = await this.exec<UsageRow>(
      `SELECT * FROM usages WHERE ${tenantWhere()} AND id = $2 LIMIT 1`,
      [householdKey, id]
    );
    const usages = await this.attachAllocations(householdKey, rows);
    return usages[0] ?? null;
  }

  async listUsages(householdKey: string, range?: DateRange): Promise<UsageRecord[]> {
    const rows = range
      ? await this.exec<UsageRow>(
          `SELECT * FROM usages WHERE ${tenantWhere()} AND usage_date >= $2 AND usage_date < $3
           ORDER BY usage_date, created_at`,
          [householdKey, range.start, range.end]
        )
      : await this.exec<UsageRow>(
          `SELECT * FROM usages WHERE ${tenantWhere()} ORDER BY usage_date, created_at`,
          [householdKey]
        );
    return this.attachAllocations(householdKey, rows);
  }

  async getUnitConversion(unitName: string): Promise<UnitConversion | null> {
    const rows = await this.exec<UnitConversion>(
      `SELECT unit_name, ratio_to_standard FROM unit_conversions WHERE unit_name = $1 LIMIT 1`,
      [unitName]
    );
    return rows[0] ?? null;
  }

  async listUnitConversions(): Promise<UnitConversion[]> {
    return this.exec<UnitConversion>(
      `SELECT unit_name, ratio_to_standard FROM unit_conversions ORDER BY unit_name`
    );
  }
}

class PostgresTransaction extends PostgresReader implements LedgerTx {
  constructor(
    private client: PoolClient,
    private readonlyMode: boolean
  ) {
    super();
  }

  protected async run<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<R[]> {
    const result = await this.client.query<R>(sql, params);
    return result.rows;
  }

  private async write(sql: string, params: unknown[]): Promise<number> {
    if (this.readonlyMode && isWriteStatement(sql)) {
      assertWritable(true);
    }
    assertHouseholdScoped(sql);
    const result = await this.client.query(sql, params);
    return result.rowCount ?? 0;
  }

  async lockIngredient(householdKey: string, ingredientId: string): Promise<void> {
    // Row lock held until COMMIT/ROLLBACK; concurrent writers on the same
    // ingredient queue here instead of racing on remaining_quantity
    await this.exec(
      `SELECT id FROM ingredients WHERE ${tenantWhere()} AND id = $2 FOR UPDATE`,
      [householdKey, ingredientId]
    );
  }

  async lockIngredientName(householdKey: string, name: string): Promise<void> {
    // Transaction-scoped advisory lock; the ingredient row may not exist yet
    await this.exec(`SELECT pg_advisory_xact_lock(hashtext($1::text || ':' || $2::text))`, [householdKey, name]);
  }

  async insertIngredient(ingredient: IngredientRecord): Promise<void> {
    await this.write(
      `INSERT INTO ingredients (id, household_key, name, category, mode, standard_unit, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        ingredient.id,
        ingredient.household_key,
        ingredient.name,
        ingredient.category,
        ingredient.mode,
        ingredient.standard_unit,
        ingredient.created_at,
      ]
    );
  }

  async insertShoppingEvent(event: ShoppingEvent): Promise<void> {
    await this.write(
      `INSERT INTO shopping_events (id, household_key, date, location, total_cost, total_waste, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        event.id,
        event.household_key,
        event.date,
        event.location,
        event.total_cost,
        event.total_waste,
        event.created_at,
      ]
    );
  }

  async addShoppingEventTotals(
    householdKey: string,
    id: string,
    delta: { cost?: number; waste?: number }
  ): Promise<void> {
    // Additive update: never recomputed from scratch
    await this.write(
      `UPDATE shopping_events
       SET total_cost = total_cost + $2, total_waste = total_waste + $3
       ${tenantUpdateWhere()} AND id = $4`,
      [householdKey, delta.cost ?? 0, delta.waste ?? 0, id]
    );
  }

  async insertBatch(batch: PurchaseBatch): Promise<void> {
    await this.write(
      `INSERT INTO purchase_batches
       (id, household_key, ingredient_id, shopping_event_id, purchase_date, expiry_date, quantity,
        remaining_quantity, unit_cost, discarded_quantity, discarded_cost, status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
      [
        batch.id,
        batch.household_key,
        batch.ingredient_id,
        batch.shopping_event_id,
        batch.purchase_date,
        batch.expiry_date,
        batch.quantity,
        batch.remaining_quantity,
        batch.unit_cost,
        batch.discarded_quantity,
        batch.discarded_cost,
        batch.status,
        batch.created_at,
      ]
    );
  }

  async updateBatch(householdKey: string, id: string, update: BatchUpdate): Promise<void> {
    await this.write(
      `UPDATE purchase_batches
       SET remaining_quantity = $2, discarded_quantity = $3, discarded_cost = $4, status = $5
       ${tenantUpdateWhere()} AND id = $6`,
      [
        householdKey,
        update.remaining_quantity,
        update.discarded_quantity,
        update.discarded_cost,
        update.status,
        id,
      ]
    );
  }

  async insertUsage(usage: UsageRecord): Promise<void> {
    await this.write(
      `INSERT INTO usages
       (id, household_key, ingredient_id, usage_date, meal_label, input_label, quantity, cost,
        uncosted_quantity, traced, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        usage.id,
        usage.household_key,
        usage.ingredient_id,
        usage.usage_date,
        usage.meal_label,
        usage.input_label,
        usage.quantity,
        usage.cost,
        usage.uncosted_quantity,
        usage.allocations !== null,
        usage.created_at,
      ]
    );

    const allocations = usage.allocations ?? [];
    for (let position = 0; position < allocations.length; position++) {
      const allocation = allocations[position];
      await this.write(
        `INSERT INTO usage_allocations (usage_id, household_key, batch_id, quantity, position)
         VALUES ($1, $2, $3, $4, $5)`,
        [usage.id, usage.household_key, allocation.batch_id, allocation.quantity, position]
      );
    }
  }

  async deleteUsage(householdKey: string, id: string): Promise<boolean> {
    // usage_allocations rows go with it (ON DELETE CASCADE)
    const deleted = await this.write(
      `DELETE FROM usages ${tenantUpdateWhere()} AND id = $2`,
      [householdKey, id]
    );
    return deleted > 0;
  }

  async upsertUnitConversion(conversion: UnitConversion): Promise<void> {
    await this.write(
      `INSERT INTO unit_conversions (unit_name, ratio_to_standard) VALUES ($1, $2)
       ON CONFLICT (unit_name) DO UPDATE SET ratio_to_standard = EXCLUDED.ratio_to_standard`,
      [conversion.unit_name, conversion.ratio_to_standard]
    );
  }

  async renameUnitConversion(from: string, to: string): Promise<boolean> {
    const renamed = await this.write(
      `UPDATE unit_conversions SET unit_name = $2 WHERE unit_name = $1`,
      [from, to]
    );
    return renamed > 0;
  }

  async rewriteUsageUnitLabels(householdKey: string, from: string, to: string): Promise<number> {
    return this.write(
      `UPDATE usages
       SET input_label = left(input_label, length(input_label) - length($2)) || $3
       ${tenantUpdateWhere()} AND right(input_label, length($2) + 1) = ' ' || $2`,
      [householdKey, from, to]
    );
  }
}

class PostgresAdapter extends PostgresReader implements LedgerAdapter {
  name = 'postgres';

  private connectionString: string;
  private pool: Pool | null = null;
  private _readonlyMode: boolean = false;

  constructor(connectionString: string, readonlyMode: boolean = false) {
    super();
    this.connectionString = connectionString;
    this._readonlyMode = readonlyMode;
  }

  /**
   * Set readonly mode (can be changed after construction)
   */
  setReadonlyMode(enabled: boolean): void {
    this._readonlyMode = enabled;
  }

  isReadonly(): boolean {
    return this._readonlyMode;
  }

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.connectionString,
        max: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
      });
    }
    return this.pool;
  }

  protected async run<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<R[]> {
    const result = await this.getPool().query<R>(sql, params);
    return result.rows;
  }

  async transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    const client = await this.getPool().connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PostgresTransaction(client, this._readonlyMode));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        const message = rollbackError instanceof Error ? rollbackError.message : 'Unknown error';
        console.error('[DB] Rollback failed:', message);
      }
      throw error;
    } finally {
      client.release();
      recordDuration('ledger_tx_ms', Date.now() - startedAt);
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.run('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}

// =============================================================================
// DB CLIENT SINGLETON
// =============================================================================

let dbInstance: LedgerAdapter | null = null;

/**
 * Get the database adapter instance.
 *
 * Selection logic:
 * - NODE_ENV=test: InMemory
 * - DATABASE_URL set: Postgres
 * - Otherwise: InMemory with warning
 */
export function getDb(): LedgerAdapter {
  if (dbInstance) {
    return dbInstance;
  }

  const isTest = process.env.NODE_ENV === 'test';
  const databaseUrl = process.env.DATABASE_URL;
  const { readonlyMode } = getFlags();

  if (isTest) {
    dbInstance = new InMemoryAdapter(readonlyMode);
    return dbInstance;
  }

  if (databaseUrl) {
    if (!databaseUrl.startsWith('postgres')) {
      throw new Error('DATABASE_URL must be a PostgreSQL connection string');
    }

    dbInstance = new PostgresAdapter(databaseUrl, readonlyMode);
    console.log('[DB] Using Postgres adapter');
    return dbInstance;
  }

  // Fallback to InMemory for local dev
  console.warn('[DB] WARNING: DATABASE_URL not set, using InMemory adapter');
  dbInstance = new InMemoryAdapter(readonlyMode);
  return dbInstance;
}

/**
 * Fresh in-memory adapter, independent of the singleton (for tests)
 */
export function createInMemoryDb(readonlyMode: boolean = false): LedgerAdapter {
  return new InMemoryAdapter(readonlyMode);
}

/**
 * Reset the database instance (for tests)
 */
export function resetDb(): void {
  dbInstance = null;
}

/**
 * Clear all data (for tests)
 */
export async function clearDb(): Promise<void> {
  const db = getDb();
  if (db.clearAll) {
    await db.clearAll();
  }
}

/**
 * Check if we're using a real database
 */
export function isRealDb(): boolean {
  return getDb().name === 'postgres';
}

/**
 * Fail fast if real DB is required but not configured
 */
export function requireRealDb(): void {
  if (process.env.NODE_ENV === 'test') {
    return; // Tests can use InMemory
  }

  if (!process.env.DATABASE_URL) {
    throw new Error(
      'DATABASE_URL is required in staging/production. ' +
      'Set DATABASE_URL to a PostgreSQL connection string.'
    );
  }
}

/**
 * Set readonly mode on the DB adapter.
 * When enabled, every write throws LedgerError('readonly_mode').
 */
export function setDbReadonly(enabled: boolean): void {
  getDb().setReadonlyMode(enabled);
}

export function isDbReadonly(): boolean {
  return getDb().isReadonly();
}
