#!/usr/bin/env node
/**
 * Unit Rename Script
 *
 * Renames unit conversions and rewrites the household's usage labels
 * that were entered in the old unit.
 *
 * Configuration:
 * - HOUSEHOLD_KEY: household whose usage labels are rewritten (required)
 * - DATABASE_URL: Postgres connection string
 *
 * Usage:
 *   HOUSEHOLD_KEY=home npm run units:rename -- 큰술=Tbsp 컵=cup
 *
 * Output: One PASS/SKIP/FAIL line per pair
 * Exit: 0 on success, 1 on failure
 */

import { getDb, requireRealDb } from '../lib/pantry-ledger/db/client';
import { parseRenamePairs, renameUnit } from '../lib/pantry-ledger/units';

const HOUSEHOLD_KEY = process.env.HOUSEHOLD_KEY;

async function main(): Promise<void> {
  if (!HOUSEHOLD_KEY) {
    console.log('FAIL missing HOUSEHOLD_KEY');
    process.exit(1);
  }

  const pairs = parseRenamePairs(process.argv.slice(2));
  if (!pairs || pairs.length === 0) {
    console.log('FAIL expected one or more old=new pairs');
    process.exit(1);
  }
  requireRealDb();

  const db = getDb();
  let failed = false;

  try {
    for (const { from, to } of pairs) {
      try {
        const result = await renameUnit(db, HOUSEHOLD_KEY, from, to);
        if (result.renamed) {
          console.log(`PASS ${from} -> ${to} (${result.labelsRewritten} usage labels)`);
        } else {
          console.log(`SKIP ${from} not found`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        console.log(`FAIL ${from} -> ${to}: ${message}`);
        failed = true;
      }
    }
  } finally {
    await db.close();
  }

  process.exit(failed ? 1 : 0);
}

main().catch(err => {
  const message = err instanceof Error ? err.message : 'Unknown error';
  console.log(`FAIL ${message}`);
  process.exit(1);
});
