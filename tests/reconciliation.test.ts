import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReconciliationError } from '../src/services/expense/errors';
import { reconcileItem, resolveCategory, resolveGroup } from '../src/services/expense/reconciliation';
import type { ParsedExpenseItem } from '../src/types/expense';
import { countRows, createTestStore, type TestContext } from './helpers';

function item(overrides: Partial<ParsedExpenseItem> = {}): ParsedExpenseItem {
  return {
    amount: '10.00',
    description: 'something',
    isNewCategory: false,
    ...overrides,
  };
}

describe('Entity Reconciliation', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestStore();
    ctx.store.ensureUser('alice');
    ctx.store.ensureUser('bob');
  });

  describe('resolveCategory', () => {
    it('should leave the category unset when no name was extracted', () => {
      expect(resolveCategory(ctx.store, 'alice', item())).toBeNull();
      expect(countRows(ctx.db, 'categories')).toBe(0);
    });

    it('should create a flagged new category with the suggested icon', () => {
      const category = resolveCategory(ctx.store, 'alice', item({
        categoryName: 'Outdoor Gear',
        isNewCategory: true,
        suggestedIcon: 'camping',
      }));

      expect(category?.name).toBe('Outdoor Gear');
      expect(category?.icon).toBe('camping');
      expect(category?.userId).toBe('alice');
    });

    it('should fall back to the generic icon when none was suggested', () => {
      const category = resolveCategory(ctx.store, 'alice', item({ categoryName: 'Misc', isNewCategory: true }));
      expect(category?.icon).toBe('category');
    });

    it('should reuse an existing category even when flagged as new', () => {
      const { category: existing } = ctx.store.getOrCreateCategory('alice', 'Groceries', 'shopping_cart');
      const resolved = resolveCategory(ctx.store, 'alice', item({ categoryName: 'groceries', isNewCategory: true, suggestedIcon: 'store' }));

      expect(resolved?.id).toBe(existing.id);
      expect(resolved?.icon).toBe('shopping_cart');
      expect(countRows(ctx.db, 'categories')).toBe(1);
    });

    it('should match an existing category case-insensitively', () => {
      const { category: existing } = ctx.store.getOrCreateCategory('alice', 'Food & Dining', 'restaurant');
      const resolved = resolveCategory(ctx.store, 'alice', item({ categoryName: 'FOOD & DINING' }));
      expect(resolved?.id).toBe(existing.id);
    });

    it('should create the category when a supposedly existing one is missing', () => {
      const resolved = resolveCategory(ctx.store, 'alice', item({ categoryName: 'Fuel', suggestedIcon: 'local_gas_station' }));

      expect(resolved?.name).toBe('Fuel');
      expect(resolved?.icon).toBe('local_gas_station');
      expect(countRows(ctx.db, 'categories')).toBe(1);
    });

    it('should be idempotent across repeated submissions', () => {
      const first = resolveCategory(ctx.store, 'alice', item({ categoryName: 'Coffee', isNewCategory: true }));
      const second = resolveCategory(ctx.store, 'alice', item({ categoryName: 'coffee', isNewCategory: false }));
      const third = resolveCategory(ctx.store, 'alice', item({ categoryName: 'COFFEE', isNewCategory: true }));

      expect(second?.id).toBe(first?.id);
      expect(third?.id).toBe(first?.id);
      expect(countRows(ctx.db, 'categories')).toBe(1);
    });

    it('should not match another user\'s category', () => {
      ctx.store.getOrCreateCategory('bob', 'Fuel', 'local_gas_station');
      const resolved = resolveCategory(ctx.store, 'alice', item({ categoryName: 'Fuel' }));

      expect(resolved?.userId).toBe('alice');
      expect(countRows(ctx.db, 'categories')).toBe(2);
    });
  });

  describe('resolveGroup', () => {
    it('should leave the group unset for personal expenses', () => {
      expect(resolveGroup(ctx.store, 'alice', item())).toBeNull();
    });

    it('should resolve a group name case-insensitively', () => {
      const group = ctx.store.createGroup('alice', 'Weekend Trip');
      expect(resolveGroup(ctx.store, 'alice', item({ groupName: 'weekend trip' }))?.id).toBe(group.id);
    });

    it('should never create a group', () => {
      expect(resolveGroup(ctx.store, 'alice', item({ groupName: 'Ski Club' }))).toBeNull();
      expect(countRows(ctx.db, 'expense_groups')).toBe(0);
    });

    it('should ignore groups the user is not a member of', () => {
      ctx.store.createGroup('bob', 'Weekend Trip');
      expect(resolveGroup(ctx.store, 'alice', item({ groupName: 'Weekend Trip' }))).toBeNull();
    });
  });

  describe('reconcileItem', () => {
    it('should resolve both references', () => {
      const group = ctx.store.createGroup('alice', 'Weekend Trip');
      const resolved = reconcileItem(ctx.store, 'alice', item({ categoryName: 'Fuel', groupName: 'WEEKEND TRIP' }));

      expect(resolved.category?.name).toBe('Fuel');
      expect(resolved.group?.id).toBe(group.id);
      expect(countRows(ctx.db, 'expenses')).toBe(0);
    });

    it('should wrap store failures in ReconciliationError', () => {
      vi.spyOn(ctx.store, 'findCategory').mockImplementation(() => {
        throw new Error('disk I/O error');
      });

      expect(() => reconcileItem(ctx.store, 'alice', item({ categoryName: 'Fuel' })))
        .toThrow(new ReconciliationError('Failed to resolve category or group: disk I/O error'));
    });
  });
});
