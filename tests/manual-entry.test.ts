import { describe, it, expect, beforeEach } from 'vitest';
import { addManualExpense, parseManualEntry, UnknownCategoryError } from '../src/services/expense/manual-entry';
import { createTestStore, type TestContext } from './helpers';

describe('Manual entry', () => {
  describe('parseManualEntry', () => {
    it('should parse "20 coffee" format', () => {
      expect(parseManualEntry('20 coffee')).toEqual({
        valid: true,
        data: { amountCents: 2000n, description: 'coffee', categoryName: undefined },
      });
    });

    it('should pick up a trailing category tag', () => {
      expect(parseManualEntry('12.50 lunch with team #Food & Dining')).toEqual({
        valid: true,
        data: { amountCents: 1250n, description: 'lunch with team', categoryName: 'Food & Dining' },
      });
    });

    it('should reject zero amounts', () => {
      expect(parseManualEntry('0 coffee')).toEqual({ valid: false, error: 'Amount must be greater than 0' });
    });

    it('should reject a tag without description', () => {
      expect(parseManualEntry('5 #Food')).toEqual({ valid: false, error: 'Description required' });
    });
  });

  describe('addManualExpense', () => {
    let ctx: TestContext;

    beforeEach(() => {
      ctx = createTestStore();
      ctx.store.ensureUser('alice');
    });

    it('should save a manual expense that is not flagged as AI-generated', () => {
      const { category } = ctx.store.getOrCreateCategory('alice', 'Food', 'restaurant');

      const expense = addManualExpense(ctx.store, 'alice', { amountCents: 1250n, description: 'lunch', categoryName: 'food' }, '2026-10-18');

      expect(expense.isAiGenerated).toBe(false);
      expect(expense.categoryId).toBe(category.id);
      expect(expense.categoryName).toBe('Food');
      expect(expense.date).toBe('2026-10-18');
    });

    it('should refuse unknown categories', () => {
      expect(() => addManualExpense(ctx.store, 'alice', { amountCents: 100n, description: 'x', categoryName: 'Nope' }))
        .toThrow(UnknownCategoryError);
      expect(ctx.store.listCategories('alice')).toEqual([]);
    });
  });
});
