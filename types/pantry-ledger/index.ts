/**
 * Pantry Ledger Type Definitions
 *
 * Row shapes match the Postgres columns one-to-one (see db/migrations).
 * Dates are `YYYY-MM-DD` strings, timestamps are ISO strings.
 */

// =============================================================================
// REFERENCE TYPES
// =============================================================================

export type StandardUnit = 'g' | 'ml' | 'count';

/**
 * precision: every use is weighed/measured
 * simple: rough tracking (pinches, splashes)
 */
export type MeasurementMode = 'precision' | 'simple';

/**
 * NOTE: there is no transition back from 'discarded' via the waste API.
 * A usage reversal restoring stock into a discarded batch flips it to 'active'.
 */
export type BatchStatus = 'active' | 'discarded';

// =============================================================================
// LEDGER ROWS
// =============================================================================

export interface IngredientRecord {
  id: string;
  household_key: string; // Partition key for multi-tenant isolation
  name: string;
  category: string;
  mode: MeasurementMode;
  standard_unit: StandardUnit;
  created_at: string;
}

/**
 * One purchase lot of an ingredient.
 *
 * INVARIANTS:
 * - 0 <= remaining_quantity <= quantity
 * - discarded_quantity + remaining_quantity + consumed = quantity
 * - unit_cost never changes after insert
 */
export interface PurchaseBatch {
  id: string;
  household_key: string;
  ingredient_id: string;
  shopping_event_id: string | null;
  purchase_date: string;
  expiry_date: string | null;
  quantity: number;
  remaining_quantity: number;
  unit_cost: number;
  discarded_quantity: number;
  discarded_cost: number;
  status: BatchStatus;
  created_at: string;
}

/**
 * Mutable columns of a batch. Everything else is fixed at insert.
 */
export type BatchUpdate = Pick<
  PurchaseBatch,
  'remaining_quantity' | 'discarded_quantity' | 'discarded_cost' | 'status'
>;

export interface ShoppingEvent {
  id: string;
  household_key: string;
  date: string;
  location: string;
  total_cost: number;
  total_waste: number; // Running sum, incremented per discard
  created_at: string;
}

/**
 * One (batch, quantity) pair drawn by a usage.
 */
export interface UsageAllocation {
  batch_id: string;
  quantity: number;
}

export interface UsageRecord {
  id: string;
  household_key: string;
  ingredient_id: string;
  usage_date: string;
  meal_label: string;
  input_label: string; // Human-entered amount, e.g. "2 큰술"
  quantity: number; // Converted to the ingredient's standard unit
  cost: number;
  uncosted_quantity: number; // Shortfall charged nothing
  allocations: UsageAllocation[] | null; // null when tracing is disabled
  created_at: string;
}

export interface UnitConversion {
  unit_name: string;
  ratio_to_standard: number;
}

// =============================================================================
// OPERATION INPUTS
// =============================================================================

export interface NewIngredientInput {
  name: string;
  category?: string;
  mode?: MeasurementMode;
  standardUnit?: StandardUnit;
}

export interface PurchaseBatchInput {
  ingredientId: string;
  quantity: number;
  unitCost: number;
  purchaseDate: string;
  expiryDate?: string | null;
  shoppingEventId?: string | null;
}

export interface ShoppingTripItem {
  name: string;
  quantity: number;
  unit: StandardUnit;
  price: number; // Price paid for the whole line, before discount
  expiryDate?: string | null;
  category?: string;
}

export interface ShoppingTripInput {
  date: string;
  location?: string;
  items: ShoppingTripItem[];
  totalPaid?: number | null;
}

export interface UsageInput {
  ingredientId: string;
  usageDate: string;
  mealLabel?: string;
  amount: number;
  unitName?: string;
}

export interface MealInput {
  usageDate: string;
  mealLabel?: string;
  items: Array<Omit<UsageInput, 'usageDate' | 'mealLabel'>>;
}

// =============================================================================
// OPERATION RESULTS
// =============================================================================

export interface AllocationLine {
  batch_id: string;
  quantity: number;
  unit_cost: number;
  cost: number;
}

export interface AllocationResult {
  cost: number;
  requestedQuantity: number;
  allocatedQuantity: number;
  shortfall: number;
  allocations: AllocationLine[];
}

export interface DiscardResult {
  changed: boolean;
  wasteCost: number;
}

export interface ShoppingTripResult {
  shoppingEventId: string;
  batchIds: string[];
  totalCost: number;
  discountRatio: number;
}

export interface RecordedUsage {
  usageId: string;
  quantity: number;
  cost: number;
  shortfall: number;
}

// =============================================================================
// REPORTS
// =============================================================================

export interface ExpiringBatch {
  batch_id: string;
  ingredient_id: string;
  name: string;
  days_left: number;
  potential_loss: number;
  remaining_quantity: number;
  unit: StandardUnit;
  expiry_date: string;
}

export interface DailyTotals {
  usage: number;
  waste: number;
  shopping: number;
  total: number; // usage + waste
}

export type DailyStats = Record<string, DailyTotals>;

export interface MonthlySummary extends DailyTotals {
  year: number;
  month: number;
}

export interface MealGroup {
  total: number;
  items: Array<{
    usage_id: string;
    name: string;
    amount: string;
    cost: number;
  }>;
}

export interface ShoppingEventDetail {
  id: string;
  date: string;
  location: string;
  total_cost: number;
  total_waste: number;
  items: Array<{
    batch_id: string;
    name: string;
    quantity: number;
    remaining: number;
    price: number;
    waste_cost: number;
    status: BatchStatus;
  }>;
}

export interface DashboardSummary {
  assetValue: number;
  expiring: ExpiringBatch[];
  todayUsageCost: number;
  month: MonthlySummary;
  cumulativeWaste: number;
}
