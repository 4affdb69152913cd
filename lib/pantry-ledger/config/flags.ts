/**
 * Pantry Ledger Flags
 *
 * Environment Variables:
 * - PANTRY_LEDGER_READONLY: Emergency write freeze
 * - LEDGER_SHORTFALL_POLICY: 'uncosted' | 'reject'
 * - LEDGER_ALLOCATION_TRACE: Record which batches each usage drew from
 * - LEDGER_EXPIRING_WINDOW_DAYS: Default window for the expiring-soon report
 *
 * Invalid values fall back to the default, never throw.
 */

/**
 * What to do when a usage asks for more than the batches hold.
 * - uncosted: take what exists, charge nothing for the rest (warns)
 * - reject: fail with insufficient_stock, ledger untouched
 */
export type ShortfallPolicy = 'uncosted' | 'reject';

export interface LedgerFlags {
  /** Read-only mode - if true, no DB writes (emergency freeze) */
  readonlyMode: boolean;
  shortfallPolicy: ShortfallPolicy;
  /** Record (batch_id, quantity) pairs on each usage for exact reversal */
  allocationTraceEnabled: boolean;
  expiringWindowDays: number;
}

export const DEFAULT_EXPIRING_WINDOW_DAYS = 3;

/**
 * Parse string "true"/"false" to boolean.
 * Returns defaultValue if undefined/null or not "true"/"false".
 */
function parseFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;

  // Invalid value - return default
  return defaultValue;
}

function parseShortfallPolicy(value: string | undefined): ShortfallPolicy {
  const normalized = value?.toLowerCase().trim();
  if (normalized === 'reject') return 'reject';
  return 'uncosted';
}

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    return defaultValue;
  }
  return parsed;
}

/**
 * Get current ledger flags from the environment.
 */
export function getFlags(): LedgerFlags {
  return {
    readonlyMode: parseFlag(process.env.PANTRY_LEDGER_READONLY, false),
    shortfallPolicy: parseShortfallPolicy(process.env.LEDGER_SHORTFALL_POLICY),
    allocationTraceEnabled: parseFlag(process.env.LEDGER_ALLOCATION_TRACE, true),
    expiringWindowDays: parsePositiveInt(
      process.env.LEDGER_EXPIRING_WINDOW_DAYS,
      DEFAULT_EXPIRING_WINDOW_DAYS
    ),
  };
}

/**
 * Get flags for testing purposes (allows override)
 */
export function getFlagsForTest(overrides?: Partial<LedgerFlags>): LedgerFlags {
  const baseFlags = getFlags();
  return {
    ...baseFlags,
    ...overrides,
  };
}
