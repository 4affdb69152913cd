#!/usr/bin/env node
/**
 * Database Migration Runner for the Pantry Ledger
 *
 * Uses schema_migrations table to track applied migrations.
 * CI-safe and idempotent - only applies unapplied migrations.
 *
 * Usage:
 *   npm run build && npm run db:migrate
 *
 * Requires:
 *   DATABASE_URL environment variable
 */

import * as fs from 'fs';
import * as path from 'path';
import { Pool } from 'pg';
import { parse as parsePgConnection } from 'pg-connection-string';

/**
 * Beside this file when run from source, db/migrations at the project
 * root when run from dist/ (tsc does not copy .sql files).
 */
export function resolveMigrationsDir(baseDir: string = __dirname): string {
  const local = path.join(baseDir, 'migrations');
  if (fs.existsSync(local)) {
    return local;
  }
  return path.resolve(baseDir, '..', '..', 'db', 'migrations');
}

const MIGRATIONS_DIR = resolveMigrationsDir();

/**
 * Required tables that must exist after migrations.
 */
export const REQUIRED_TABLES = [
  'ingredients',
  'shopping_events',
  'purchase_batches',
  'usages',
  'usage_allocations',
  'unit_conversions',
  'schema_migrations',
] as const;

/**
 * Required columns per table.
 * Catches schema drift before the adapter hits it at runtime.
 */
export const REQUIRED_COLUMNS: Map<string, string[]> = new Map([
  ['ingredients', ['id', 'household_key', 'name', 'category', 'mode', 'standard_unit', 'created_at']],
  ['shopping_events', ['id', 'household_key', 'date', 'location', 'total_cost', 'total_waste', 'created_at']],
  ['purchase_batches', [
    'id',
    'household_key',
    'ingredient_id',
    'shopping_event_id',
    'purchase_date',
    'expiry_date',
    'quantity',
    'remaining_quantity',
    'unit_cost',
    'discarded_quantity',
    'discarded_cost',
    'status',
    'created_at',
  ]],
  ['usages', [
    'id',
    'household_key',
    'ingredient_id',
    'usage_date',
    'meal_label',
    'input_label',
    'quantity',
    'cost',
    'uncosted_quantity',
    'traced',
    'created_at',
  ]],
  ['usage_allocations', ['usage_id', 'household_key', 'batch_id', 'quantity', 'position']],
  ['unit_conversions', ['unit_name', 'ratio_to_standard']],
  ['schema_migrations', ['filename', 'applied_at']],
]);

/**
 * Map of "table.column" -> expected information_schema data_type.
 * ALL tenant tables must have household_key as TEXT; dates must stay DATE
 * so the adapter's text parser applies.
 */
export const REQUIRED_COLUMN_TYPES: Map<string, string> = new Map([
  ['ingredients.household_key', 'text'],
  ['shopping_events.household_key', 'text'],
  ['purchase_batches.household_key', 'text'],
  ['usages.household_key', 'text'],
  ['usage_allocations.household_key', 'text'],
  ['shopping_events.date', 'date'],
  ['purchase_batches.purchase_date', 'date'],
  ['purchase_batches.expiry_date', 'date'],
  ['usages.usage_date', 'date'],
  ['purchase_batches.remaining_quantity', 'double precision'],
  ['purchase_batches.unit_cost', 'double precision'],
  ['usages.traced', 'boolean'],
]);

/**
 * Columns that must NOT be nullable.
 */
export const NOT_NULL_COLUMNS: string[] = [
  'ingredients.household_key',
  'shopping_events.household_key',
  'purchase_batches.household_key',
  'purchase_batches.ingredient_id',
  'purchase_batches.remaining_quantity',
  'usages.household_key',
  'usages.ingredient_id',
  'usage_allocations.household_key',
];

/**
 * Required CHECK constraints, by table.
 */
export const REQUIRED_CONSTRAINTS: Map<string, string[]> = new Map([
  ['ingredients', ['ingredients_household_key_nonempty', 'ingredients_mode_check']],
  ['shopping_events', ['shopping_events_household_key_nonempty']],
  ['purchase_batches', [
    'purchase_batches_household_key_nonempty',
    'purchase_batches_status_check',
    'purchase_batches_remaining_check',
  ]],
  ['usages', ['usages_household_key_nonempty']],
  ['usage_allocations', ['usage_allocations_household_key_nonempty']],
]);

// =============================================================================
// TYPES
// =============================================================================

export interface MigrationFile {
  name: string;
  path: string;
  order: number;
}

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  failed: string | null;
}

// =============================================================================
// MIGRATION LOGIC (exportable for testing)
// =============================================================================

/**
 * Get sorted list of migration files from disk
 */
export function getMigrationFiles(migrationsDir: string = MIGRATIONS_DIR): MigrationFile[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }

  return fs
    .readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .map(f => ({
      name: f,
      path: path.join(migrationsDir, f),
      order: parseInt(f.split('_')[0], 10) || 0,
    }))
    .sort((a, b) => a.order - b.order || a.name.localeCompare(b.name));
}

/**
 * Filter to only unapplied migrations
 */
export function getUnappliedMigrations(
  allMigrations: MigrationFile[],
  appliedFilenames: Set<string>
): MigrationFile[] {
  return allMigrations.filter(m => !appliedFilenames.has(m.name));
}

const SCHEMA_MIGRATIONS_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  id SERIAL PRIMARY KEY,
  filename TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

/**
 * SSL when the connection string asks for it (sslmode, ssl=true) or
 * points at a hosted provider that always requires it.
 */
export function needsSsl(databaseUrl: string): boolean {
  const config = parsePgConnection(databaseUrl);
  if (config.ssl) {
    return true;
  }
  const host = config.host ?? '';
  return host.endsWith('supabase.com') || host.endsWith('neon.tech');
}

// =============================================================================
// DATABASE ADAPTER INTERFACE (for testing)
// =============================================================================

export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
  end(): Promise<void>;
}

/**
 * Wrap a pg Pool as a DbClient
 */
export function fromPool(pool: Pool): DbClient {
  return {
    async query<T>(sql: string, params: unknown[] = []): Promise<{ rows: T[] }> {
      const result = await pool.query(sql, params);
      return { rows: result.rows };
    },
    end: () => pool.end(),
  };
}

async function ensureMigrationsTable(client: DbClient): Promise<void> {
  await client.query(SCHEMA_MIGRATIONS_SQL);
}

async function getAppliedMigrations(client: DbClient): Promise<Set<string>> {
  const result = await client.query<{ filename: string }>(
    'SELECT filename FROM schema_migrations ORDER BY filename'
  );
  return new Set(result.rows.map(r => r.filename));
}

async function recordMigration(client: DbClient, filename: string): Promise<void> {
  await client.query(
    'INSERT INTO schema_migrations (filename) VALUES ($1) ON CONFLICT (filename) DO NOTHING',
    [filename]
  );
}

function groupByTable<T extends { table_name: string }>(
  rows: T[],
  pick: (row: T) => string
): Map<string, Set<string>> {
  const byTable = new Map<string, Set<string>>();
  for (const row of rows) {
    const set = byTable.get(row.table_name) ?? new Set<string>();
    set.add(pick(row));
    byTable.set(row.table_name, set);
  }
  return byTable;
}

/**
 * Verify required tables exist in database
 */
export async function verifyRequiredTables(
  client: DbClient,
  requiredTables: readonly string[] = REQUIRED_TABLES
): Promise<{ valid: boolean; missing: string[]; found: string[] }> {
  const result = await client.query<{ table_name: string }>(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'public'
    AND table_type = 'BASE TABLE'
  `);

  const existingTables = new Set(result.rows.map(r => r.table_name));
  const found = requiredTables.filter(t => existingTables.has(t));
  const missing = requiredTables.filter(t => !existingTables.has(t));

  return {
    valid: missing.length === 0,
    missing,
    found,
  };
}

export interface ColumnVerificationResult {
  valid: boolean;
  missingColumns: Map<string, string[]>;
  checkedTables: string[];
  errors: string[];
}

/**
 * Verify required columns exist for each table.
 */
export async function verifyRequiredColumns(
  client: DbClient,
  requiredColumns: Map<string, string[]> = REQUIRED_COLUMNS
): Promise<ColumnVerificationResult> {
  const result: ColumnVerificationResult = {
    valid: true,
    missingColumns: new Map(),
    checkedTables: [],
    errors: [],
  };

  const columnsResult = await client.query<{ table_name: string; column_name: string }>(`
    SELECT table_name, column_name
    FROM information_schema.columns
    WHERE table_schema = 'public'
  `);
  const columnsByTable = groupByTable(columnsResult.rows, r => r.column_name);

  for (const [tableName, requiredCols] of requiredColumns) {
    result.checkedTables.push(tableName);

    const existingCols = columnsByTable.get(tableName);
    if (!existingCols) {
      result.errors.push(`Table '${tableName}' does not exist (cannot verify columns)`);
      result.valid = false;
      continue;
    }

    const missing = requiredCols.filter(col => !existingCols.has(col));
    if (missing.length > 0) {
      result.missingColumns.set(tableName, missing);
      result.errors.push(`Table '${tableName}' missing columns: ${missing.join(', ')}`);
      result.valid = false;
    }
  }

  return result;
}

export interface TypeVerificationResult {
  valid: boolean;
  mismatches: Array<{ column: string; expected: string; actual: string }>;
  errors: string[];
}

export async function verifyRequiredColumnTypes(
  client: DbClient,
  requiredTypes: Map<string, string> = REQUIRED_COLUMN_TYPES
): Promise<TypeVerificationResult> {
  const result: TypeVerificationResult = {
    valid: true,
    mismatches: [],
    errors: [],
  };

  const typesResult = await client.query<{
    table_name: string;
    column_name: string;
    data_type: string;
  }>(`
    SELECT table_name, column_name, data_type
    FROM information_schema.columns
    WHERE table_schema = 'public'
  `);

  const columnTypes = new Map<string, string>();
  for (const row of typesResult.rows) {
    columnTypes.set(`${row.table_name}.${row.column_name}`, row.data_type.toLowerCase());
  }

  for (const [columnKey, expectedType] of requiredTypes) {
    const actualType = columnTypes.get(columnKey);

    if (!actualType) {
      result.errors.push(`Column '${columnKey}' not found`);
      result.valid = false;
      continue;
    }

    if (actualType !== expectedType.toLowerCase()) {
      result.mismatches.push({ column: columnKey, expected: expectedType, actual: actualType });
      result.errors.push(
        `Column '${columnKey}' type mismatch: expected '${expectedType}', got '${actualType}'`
      );
      result.valid = false;
    }
  }

  return result;
}

export interface NotNullVerificationResult {
  valid: boolean;
  nullableColumns: string[];
  errors: string[];
}

export async function verifyNotNull(
  client: DbClient,
  notNullColumns: string[] = NOT_NULL_COLUMNS
): Promise<NotNullVerificationResult> {
  const result: NotNullVerificationResult = {
    valid: true,
    nullableColumns: [],
    errors: [],
  };

  const nullableResult = await client.query<{
    table_name: string;
    column_name: string;
    is_nullable: string;
  }>(`
    SELECT table_name, column_name, is_nullable
    FROM information_schema.columns
    WHERE table_schema = 'public'
  `);

  const columnNullable = new Map<string, boolean>();
  for (const row of nullableResult.rows) {
    columnNullable.set(`${row.table_name}.${row.column_name}`, row.is_nullable === 'YES');
  }

  for (const columnKey of notNullColumns) {
    const isNullable = columnNullable.get(columnKey);

    if (isNullable === undefined) {
      result.errors.push(`Column '${columnKey}' not found`);
      result.valid = false;
      continue;
    }

    if (isNullable) {
      result.nullableColumns.push(columnKey);
      result.errors.push(`Column '${columnKey}' should be NOT NULL but is nullable`);
      result.valid = false;
    }
  }

  return result;
}

export interface ConstraintVerificationResult {
  valid: boolean;
  missing: Array<{ table: string; constraint: string }>;
  errors: string[];
}

/**
 * Verify required CHECK constraints exist (pg_constraint).
 */
export async function verifyRequiredConstraints(
  client: DbClient,
  requiredConstraints: Map<string, string[]> = REQUIRED_CONSTRAINTS
): Promise<ConstraintVerificationResult> {
  const result: ConstraintVerificationResult = {
    valid: true,
    missing: [],
    errors: [],
  };

  const constraintsResult = await client.query<{ table_name: string; constraint_name: string }>(`
    SELECT
      c.relname AS table_name,
      con.conname AS constraint_name
    FROM pg_constraint con
    JOIN pg_class c ON con.conrelid = c.oid
    JOIN pg_namespace n ON c.relnamespace = n.oid
    WHERE n.nspname = 'public'
      AND con.contype = 'c'
  `);
  const existing = groupByTable(constraintsResult.rows, r => r.constraint_name);

  for (const [tableName, constraints] of requiredConstraints) {
    const tableConstraints = existing.get(tableName) ?? new Set<string>();

    for (const constraintName of constraints) {
      if (!tableConstraints.has(constraintName)) {
        result.missing.push({ table: tableName, constraint: constraintName });
        result.errors.push(`Missing CHECK constraint '${constraintName}' on table '${tableName}'`);
        result.valid = false;
      }
    }
  }

  return result;
}

/**
 * Run migrations using provided client
 */
export async function runMigrationsWithClient(
  client: DbClient,
  migrationsDir: string = MIGRATIONS_DIR
): Promise<MigrationResult> {
  const result: MigrationResult = {
    applied: [],
    skipped: [],
    failed: null,
  };

  await ensureMigrationsTable(client);

  const allMigrations = getMigrationFiles(migrationsDir);
  const appliedFilenames = await getAppliedMigrations(client);
  const unapplied = getUnappliedMigrations(allMigrations, appliedFilenames);

  for (const migration of allMigrations) {
    if (appliedFilenames.has(migration.name)) {
      result.skipped.push(migration.name);
    }
  }

  for (const migration of unapplied) {
    try {
      const sql = fs.readFileSync(migration.path, 'utf-8');
      await client.query(sql);
      await recordMigration(client, migration.name);
      result.applied.push(migration.name);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      // "already exists" means the schema is there; record and move on
      if (message.includes('already exists')) {
        await recordMigration(client, migration.name);
        result.skipped.push(migration.name);
      } else {
        result.failed = migration.name;
        throw error;
      }
    }
  }

  return result;
}

// =============================================================================
// MAIN (CLI)
// =============================================================================

function reportFailures(title: string, errors: string[]): never {
  console.log(`${title} FAILED:\n`);
  for (const error of errors) {
    console.error(`  ✗ ${error}`);
  }
  console.error('\nMigration verification failed.');
  process.exit(1);
}

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    console.error('ERROR: DATABASE_URL environment variable is required');
    console.error('Set DATABASE_URL to your PostgreSQL connection string');
    process.exit(1);
  }

  console.log('=== Pantry Ledger Database Migration ===\n');
  console.log('Connecting to database...');

  const client = fromPool(
    new Pool({
      connectionString: databaseUrl,
      ssl: needsSsl(databaseUrl) ? { rejectUnauthorized: false } : false,
      max: 1,
      connectionTimeoutMillis: 10000,
    })
  );

  try {
    await client.query('SELECT 1');
    console.log('Connected successfully!\n');

    console.log(`Found ${getMigrationFiles().length} migration files\n`);

    const result = await runMigrationsWithClient(client);

    if (result.skipped.length > 0) {
      console.log('Already applied (skipped):');
      for (const name of result.skipped) {
        console.log(`  ⊙ ${name}`);
      }
      console.log('');
    }

    if (result.applied.length > 0) {
      console.log('Newly applied:');
      for (const name of result.applied) {
        console.log(`  ✓ ${name}`);
      }
      console.log('');
    }

    if (result.applied.length === 0 && result.skipped.length > 0) {
      console.log('All migrations already applied.\n');
    }

    console.log('=== Verifying Required Tables ===\n');
    const tableVerification = await verifyRequiredTables(client);
    for (const table of REQUIRED_TABLES) {
      const status = tableVerification.found.includes(table) ? '✓' : '✗';
      console.log(`  ${status} ${table}`);
    }
    if (!tableVerification.valid) {
      console.error(`\nERROR: Missing required tables: ${tableVerification.missing.join(', ')}`);
      process.exit(1);
    }

    console.log('\n=== Verifying Required Columns ===\n');
    const columnVerification = await verifyRequiredColumns(client);
    if (!columnVerification.valid) {
      reportFailures('Column verification', columnVerification.errors);
    }
    console.log(`✓ All required columns present in ${columnVerification.checkedTables.length} tables`);

    console.log('\n=== Verifying Column Types ===\n');
    const typeVerification = await verifyRequiredColumnTypes(client);
    if (!typeVerification.valid) {
      reportFailures('Type verification', typeVerification.errors);
    }
    console.log(`✓ All ${REQUIRED_COLUMN_TYPES.size} critical column types verified`);

    console.log('\n=== Verifying NOT NULL Constraints ===\n');
    const notNullVerification = await verifyNotNull(client);
    if (!notNullVerification.valid) {
      reportFailures('NOT NULL verification', notNullVerification.errors);
    }
    console.log(`✓ All ${NOT_NULL_COLUMNS.length} NOT NULL constraints verified`);

    console.log('\n=== Verifying CHECK Constraints ===\n');
    const constraintVerification = await verifyRequiredConstraints(client);
    if (!constraintVerification.valid) {
      reportFailures('Constraint verification', constraintVerification.errors);
    }
    console.log('✓ All required CHECK constraints present');

    console.log('\n=== Migration Complete ===');
    console.log(`Applied: ${result.applied.length}, Skipped: ${result.skipped.length}`);
    console.log(`Tables verified: ${tableVerification.found.length}/${REQUIRED_TABLES.length}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`\nMigration failed: ${message}`);
    process.exit(1);
  } finally {
    await client.end();
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch(err => {
    console.error('Unexpected error:', err);
    process.exit(1);
  });
}
