/**
 * Invariants Tests
 */

import type { UsageRecord } from '../../../types/pantry-ledger';
import { assertBatchInvariants, checkConservation, validateBatch } from '../invariants';
import { isLedgerError } from '../errors';
import { TEST_HOUSEHOLD_KEY, makeBatch } from './helpers';

function usageDrawing(allocations: UsageRecord['allocations']): UsageRecord {
  return {
    id: 'usage-1',
    household_key: TEST_HOUSEHOLD_KEY,
    ingredient_id: 'ingredient-1',
    usage_date: '2024-03-05',
    meal_label: '',
    input_label: '',
    quantity: 0,
    cost: 0,
    uncosted_quantity: 0,
    allocations,
    created_at: '2024-03-05T00:00:00.000Z',
  };
}

describe('Invariants', () => {
  describe('validateBatch', () => {
    it('accepts a consistent batch', () => {
      expect(validateBatch(makeBatch({ remaining_quantity: 4, discarded_quantity: 2 }))).toEqual({
        valid: true,
        errors: [],
      });
    });

    it('rejects remaining above quantity', () => {
      const result = validateBatch(makeBatch({ remaining_quantity: 11 }));

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        { field: 'remaining_quantity', message: 'remaining_quantity exceeds quantity' },
        {
          field: 'discarded_quantity',
          message: 'discarded_quantity + remaining_quantity exceeds quantity',
        },
      ]);
    });

    it('rejects discarded plus remaining above quantity', () => {
      const result = validateBatch(makeBatch({ remaining_quantity: 6, discarded_quantity: 5 }));
      expect(result.errors.map(e => e.field)).toEqual(['discarded_quantity']);
    });

    it('rejects negative and non-finite numbers', () => {
      const result = validateBatch(makeBatch({ remaining_quantity: -1, unit_cost: NaN }));
      expect(result.errors.map(e => e.field)).toEqual(['unit_cost', 'remaining_quantity']);
    });

    it('rejects a discarded batch with stock', () => {
      const result = validateBatch(makeBatch({ status: 'discarded', remaining_quantity: 1 }));
      expect(result.errors).toEqual([{ field: 'status', message: 'discarded batch still has stock' }]);
    });

    it('requires a household key', () => {
      expect(validateBatch(makeBatch({ household_key: '' })).errors.map(e => e.field)).toEqual([
        'household_key',
      ]);
    });

    it('tolerates float noise at the quantity boundary', () => {
      expect(validateBatch(makeBatch({ quantity: 0.3, remaining_quantity: 0.1 + 0.2 })).valid).toBe(true);
    });
  });

  describe('assertBatchInvariants', () => {
    it('throws inconsistent_state naming the batch', () => {
      let error: unknown = null;
      try {
        assertBatchInvariants(makeBatch({ id: 'b-9', remaining_quantity: 11 }));
      } catch (e) {
        error = e;
      }

      expect(isLedgerError(error, 'inconsistent_state')).toBe(true);
      expect(error instanceof Error && error.message).toMatch(/^INVARIANT VIOLATION on batch b-9: /);
    });
  });

  describe('checkConservation', () => {
    it('holds when remaining + allocated + discarded = purchased', () => {
      const batches = [
        makeBatch({ id: 'A', quantity: 10, remaining_quantity: 3, discarded_quantity: 2 }),
        makeBatch({ id: 'B', quantity: 5, remaining_quantity: 5 }),
      ];
      const usages = [usageDrawing([{ batch_id: 'A', quantity: 5 }])];

      expect(checkConservation(batches, usages)).toEqual({
        holds: true,
        purchased: 15,
        remaining: 8,
        allocated: 5,
        discarded: 2,
      });
    });

    it('ignores allocations against other batches and untraced usages', () => {
      const batches = [makeBatch({ id: 'A', quantity: 10, remaining_quantity: 6 })];
      const usages = [
        usageDrawing([{ batch_id: 'Z', quantity: 4 }]),
        usageDrawing(null),
      ];

      const report = checkConservation(batches, usages);

      expect(report.allocated).toBe(0);
      expect(report.holds).toBe(false);
    });
  });
});
