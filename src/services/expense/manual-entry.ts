import type { ExpenseView } from '../../types/expense';
import { todayIso } from '../../utils/date';
import type { EntityStore } from '../database/entity-store';
import { AmountSchema, ManualEntrySchema, validateInput } from '../validation/schemas';

export interface ManualEntry {
  amountCents: bigint;
  description: string;
  categoryName?: string;
}

/**
 * Parse "<amount> <description> [#Category]", e.g. "12.50 lunch #Food".
 */
export function parseManualEntry(text: string): { valid: true; data: ManualEntry } | { valid: false; error: string } {
  const entry = validateInput(ManualEntrySchema, text);
  if (!entry.valid) {
    return entry;
  }

  const amount = validateInput(AmountSchema, entry.data.amount);
  if (!amount.valid) {
    return amount;
  }

  const tagIndex = entry.data.description.indexOf('#');
  const description = (tagIndex >= 0 ? entry.data.description.slice(0, tagIndex) : entry.data.description).trim();
  const categoryName = tagIndex >= 0 ? entry.data.description.slice(tagIndex + 1).trim() : '';

  if (!description) {
    return { valid: false, error: 'Description required' };
  }

  return {
    valid: true,
    data: {
      amountCents: amount.data,
      description,
      categoryName: categoryName || undefined,
    },
  };
}

export class UnknownCategoryError extends Error {
  constructor(readonly categoryName: string) {
    super(`No category named "${categoryName}"`);
    this.name = 'UnknownCategoryError';
  }
}

/**
 * Save a user-typed expense. Unlike the AI path, the category must already exist.
 */
export function addManualExpense(
  store: EntityStore,
  userId: string,
  entry: ManualEntry,
  date: string = todayIso(),
): ExpenseView {
  let categoryId: string | undefined;
  if (entry.categoryName) {
    const category = store.findCategory(userId, entry.categoryName);
    if (!category) {
      throw new UnknownCategoryError(entry.categoryName);
    }
    categoryId = category.id;
  }

  const expense = store.createExpense({
    description: entry.description,
    amountCents: entry.amountCents,
    date,
    categoryId,
    paidBy: userId,
    isAiGenerated: false,
  });

  const view = store.getExpense(expense.id);
  if (!view) {
    throw new Error(`Expense ${expense.id} missing after insert`);
  }
  return view;
}
