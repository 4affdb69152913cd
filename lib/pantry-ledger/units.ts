/**
 * Unit Conversion
 *
 * Named kitchen units → multiplier into an ingredient's standard unit.
 * Callers convert before allocating; the allocator only sees standard units.
 */

import type { UnitConversion } from '../../types/pantry-ledger';
import type { LedgerAdapter } from './db/client';
import { LedgerError, invalidAmount } from './errors';

/**
 * Seed rows (tablespoon, cup, teaspoon). Also inserted by migration 002.
 */
export const DEFAULT_UNIT_CONVERSIONS: readonly UnitConversion[] = [
  { unit_name: '큰술', ratio_to_standard: 15 },
  { unit_name: '컵', ratio_to_standard: 200 },
  { unit_name: '작은술', ratio_to_standard: 5 },
];

/** Pseudo-unit meaning "already in the standard unit" */
export const STANDARD_UNIT_NAME = 'std';

export interface ConvertedAmount {
  quantity: number;
  /** Unit the amount was entered in, null when it was already standard */
  unitName: string | null;
}

/**
 * amount × ratio for a known unit; the amount unchanged for 'std',
 * a missing unit or a unit with no conversion row. An unknown unit keeps
 * its entered name so the usage label still shows what was typed.
 */
export async function convertToStandard(
  db: LedgerAdapter,
  amount: number,
  unitName?: string | null
): Promise<ConvertedAmount> {
  if (!Number.isFinite(amount) || amount < 0) {
    throw invalidAmount(`amount must be a non-negative number, got ${amount}`);
  }
  if (!unitName || unitName === STANDARD_UNIT_NAME) {
    return { quantity: amount, unitName: null };
  }
  const conversion = await db.getUnitConversion(unitName);
  if (!conversion) {
    return { quantity: amount, unitName };
  }
  return { quantity: amount * conversion.ratio_to_standard, unitName: conversion.unit_name };
}

export async function listUnitConversions(db: LedgerAdapter): Promise<UnitConversion[]> {
  return db.listUnitConversions();
}

export async function defineUnit(db: LedgerAdapter, unitName: string, ratio: number): Promise<void> {
  const name = unitName.trim();
  if (!name || name === STANDARD_UNIT_NAME) {
    throw invalidAmount(`invalid unit name: "${unitName}"`);
  }
  if (!Number.isFinite(ratio) || ratio <= 0) {
    throw invalidAmount(`ratio must be a positive number, got ${ratio}`);
  }
  await db.transaction(tx => tx.upsertUnitConversion({ unit_name: name, ratio_to_standard: ratio }));
}

export interface UnitRename {
  from: string;
  to: string;
}

/**
 * Parse "old=new" arguments. Returns null on the first malformed pair.
 */
export function parseRenamePairs(args: readonly string[]): UnitRename[] | null {
  const pairs: UnitRename[] = [];
  for (const arg of args) {
    const index = arg.indexOf('=');
    if (index <= 0 || index === arg.length - 1) {
      return null;
    }
    pairs.push({ from: arg.slice(0, index).trim(), to: arg.slice(index + 1).trim() });
  }
  return pairs;
}

export interface RenameUnitResult {
  renamed: boolean;
  labelsRewritten: number;
}

/**
 * Rename a unit and rewrite the household's usage labels ("2 old" → "2 new").
 * Unknown `from` leaves everything untouched.
 */
export async function renameUnit(
  db: LedgerAdapter,
  householdKey: string,
  from: string,
  to: string
): Promise<RenameUnitResult> {
  const target = to.trim();
  if (!target || target === STANDARD_UNIT_NAME) {
    throw invalidAmount(`invalid unit name: "${to}"`);
  }
  if (from === target) {
    return { renamed: false, labelsRewritten: 0 };
  }

  return db.transaction(async tx => {
    if (await tx.getUnitConversion(target)) {
      throw new LedgerError('invalid_amount', `unit already exists: ${target}`);
    }
    const renamed = await tx.renameUnitConversion(from, target);
    if (!renamed) {
      return { renamed: false, labelsRewritten: 0 };
    }
    const labelsRewritten = await tx.rewriteUsageUnitLabels(householdKey, from, target);
    return { renamed, labelsRewritten };
  });
}
