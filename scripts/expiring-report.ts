#!/usr/bin/env node
/**
 * Expiring Stock Report
 *
 * Prints the household's asset value and the batches expiring soon.
 *
 * Configuration:
 * - HOUSEHOLD_KEY: household to report on (required)
 * - LEDGER_EXPIRING_WINDOW_DAYS: window in days (default: 3)
 * - DATABASE_URL: Postgres connection string
 *
 * Usage:
 *   HOUSEHOLD_KEY=home npm run report:expiring
 *
 * Exit: 0 on success, 1 on failure
 */

import { getDb, requireRealDb } from '../lib/pantry-ledger/db/client';
import { getFlags } from '../lib/pantry-ledger/config/flags';
import { getAssetValue, getExpiringSoon } from '../lib/pantry-ledger/reports';
import { todayIso } from '../lib/pantry-ledger/dates';
import { logMetricsIfDev } from '../lib/pantry-ledger/monitoring/metrics';

const HOUSEHOLD_KEY = process.env.HOUSEHOLD_KEY;

function formatMoney(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

async function main(): Promise<void> {
  if (!HOUSEHOLD_KEY) {
    console.log('FAIL missing HOUSEHOLD_KEY');
    process.exit(1);
  }
  requireRealDb();

  const db = getDb();
  const today = todayIso();
  const windowDays = getFlags().expiringWindowDays;

  try {
    const assetValue = await getAssetValue(db, HOUSEHOLD_KEY);
    const expiring = await getExpiringSoon(db, HOUSEHOLD_KEY, windowDays, today);

    console.log(`=== Pantry report ${today} ===`);
    console.log(`Asset value: ${formatMoney(assetValue)}`);
    console.log(`Expiring within ${windowDays} day(s): ${expiring.length}`);

    for (const item of expiring) {
      const when = item.days_left === 0 ? 'today' : `in ${item.days_left}d`;
      console.log(
        `  - ${item.name}: ${item.remaining_quantity}${item.unit} ${when}, potential loss ${formatMoney(item.potential_loss)}`
      );
    }

    const loss = expiring.reduce((sum, item) => sum + item.potential_loss, 0);
    console.log(`Potential loss total: ${formatMoney(loss)}`);
    logMetricsIfDev();
  } finally {
    await db.close();
  }
}

main().catch(err => {
  const message = err instanceof Error ? err.message : 'Unknown error';
  console.log(`FAIL ${message}`);
  process.exit(1);
});
