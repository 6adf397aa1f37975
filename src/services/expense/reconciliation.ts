import { DEFAULT_CATEGORY_ICON } from '../../config/constants';
import type { Category, Group, ParsedExpenseItem, ResolvedReferences } from '../../types/expense';
import type { EntityStore } from '../database/entity-store';
import { ReconciliationError } from './errors';

/**
 * Map an extracted category name onto the user's categories.
 *
 * The model's `isNewCategory` flag decides how we look the name up, but not
 * whether a category ends up attached: a name that should have matched and
 * didn't is created rather than dropped.
 */
export function resolveCategory(store: EntityStore, userId: string, item: ParsedExpenseItem): Category | null {
  if (!item.categoryName) {
    return null;
  }

  const icon = item.suggestedIcon ?? DEFAULT_CATEGORY_ICON;

  if (item.isNewCategory) {
    const { category, created } = store.getOrCreateCategory(userId, item.categoryName, icon);
    if (created) {
      console.log(`[Reconcile] Created new category: ${category.name} with icon: ${category.icon}`);
    }
    return category;
  }

  const existing = store.findCategory(userId, item.categoryName);
  if (existing) {
    return existing;
  }

  const { category } = store.getOrCreateCategory(userId, item.categoryName, icon);
  console.log(`[Reconcile] Category "${item.categoryName}" not found, created it`);
  return category;
}

/**
 * Groups are shared between users, so an unmatched name never creates one;
 * the expense stays personal instead.
 */
export function resolveGroup(store: EntityStore, userId: string, item: ParsedExpenseItem): Group | null {
  if (!item.groupName) {
    return null;
  }

  const group = store.findGroupForMember(userId, item.groupName);
  if (!group) {
    console.log(`[Reconcile] No group "${item.groupName}" for user ${userId}, keeping expense personal`);
  }
  return group;
}

export function reconcileItem(store: EntityStore, userId: string, item: ParsedExpenseItem): ResolvedReferences {
  try {
    return {
      category: resolveCategory(store, userId, item),
      group: resolveGroup(store, userId, item),
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReconciliationError(`Failed to resolve category or group: ${reason}`, { cause: error });
  }
}
