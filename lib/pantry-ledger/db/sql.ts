/**
 * SQL Helper Functions for the Tenant-Safe Dialect
 *
 * Contract: $1 is ALWAYS household_key for tenant-scoped queries.
 * unit_conversions is global reference data and is the only unscoped table.
 */

/**
 * Standard table aliases for tenant tables.
 */
export const TABLE_ALIASES = {
  ingredients: 'ing',
  shopping_events: 'se',
  purchase_batches: 'pb',
  usages: 'u',
  usage_allocations: 'ua',
} as const;

/**
 * @returns SQL fragment: `<alias>.household_key = $1`, unqualified without an alias
 *
 * @example
 * `SELECT * FROM purchase_batches pb WHERE ${tenantWhere('pb')}`
 */
export function tenantWhere(alias?: string): string {
  return alias ? `${alias}.household_key = $1` : 'household_key = $1';
}

/**
 * @returns SQL fragment starter for an UPDATE/DELETE WHERE clause
 *
 * @example
 * `UPDATE purchase_batches SET status = $2 ${tenantUpdateWhere()} AND id = $3`
 */
export function tenantUpdateWhere(alias?: string): string {
  return `WHERE ${tenantWhere(alias)}`;
}

/**
 * FIFO order for batches: oldest purchase first, earliest expiry first,
 * batches without expiry after those with one, then insertion order.
 * compareFifo() in ledger/fifo.ts breaks the same ties by insertion order.
 */
export function fifoOrderBy(alias: string): string {
  return `ORDER BY ${alias}.purchase_date ASC, ${alias}.expiry_date ASC NULLS LAST, ${alias}.created_at ASC, ${alias}.id ASC`;
}

/**
 * Returns true if the statement mutates data.
 */
export function isWriteStatement(sql: string): boolean {
  const normalized = sql.trim().toLowerCase();
  return /^(insert|update|delete|alter|create|drop|truncate)\b/.test(normalized);
}
