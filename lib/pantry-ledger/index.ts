/**
 * Pantry Ledger
 *
 * FIFO batch ledger for a household kitchen: purchases, costed usage,
 * waste, reversal and the rollups built on them.
 */

export * from '../../types/pantry-ledger';

export { allocate, allocateWithinTx, estimateUnitCost, type AllocateOptions } from './ledger/allocator';
export { discard, setFullyDiscarded } from './ledger/waste';
export { recordUsage, recordMeal, type RecordUsageOptions } from './ledger/usage';
export { reverseUsage } from './ledger/reversal';
export {
  createIngredient,
  findOrCreateIngredient,
  listIngredients,
  recordPurchaseBatch,
  recordShoppingTrip,
  discountRatio,
  type PurchaseOptions,
} from './ledger/purchases';
export { compareFifo, EPSILON } from './ledger/fifo';

export {
  getAssetValue,
  getExpiringSoon,
  getDailyStats,
  getMonthlySummary,
  getDailyDetail,
  getShoppingEventDetail,
  getDashboardSummary,
} from './reports';

export {
  DEFAULT_UNIT_CONVERSIONS,
  convertToStandard,
  defineUnit,
  renameUnit,
  listUnitConversions,
} from './units';

export { validateBatch, assertBatchInvariants, checkConservation } from './invariants';
export { LedgerError, isLedgerError, isReadonlyModeError, type LedgerErrorCode } from './errors';
export { getFlags, type LedgerFlags, type ShortfallPolicy } from './config/flags';
export { getSnapshot, getDurationSnapshot, getMetric, type MetricName } from './monitoring/metrics';

export {
  getDb,
  resetDb,
  clearDb,
  createInMemoryDb,
  isRealDb,
  requireRealDb,
  setDbReadonly,
  isDbReadonly,
  type LedgerAdapter,
  type LedgerReader,
  type LedgerTx,
  type DateRange,
} from './db/client';
