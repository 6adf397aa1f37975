import { DEFAULT_EXPENSE_DESCRIPTION } from '../../config/constants';
import type { Expense, ParsedExpenseItem, ResolvedReferences } from '../../types/expense';
import type { EntityStore } from '../database/entity-store';
import { formatAmount } from '../feedback/messages';

export interface MaterializedExpense {
  expense: Expense;
  categoryName: string | null;
  categoryIcon: string | null;
  groupName: string | null;
}

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Convert a decimal string ("32.75", "45", "0.5") to integer cents exactly.
 */
export function parseAmountCents(amount: string): bigint {
  const match = DECIMAL_PATTERN.exec(amount.trim());
  if (!match) {
    throw new Error(`Invalid amount: "${amount}"`);
  }

  const whole = BigInt(match[1]);
  const fraction = BigInt((match[2] ?? '').padEnd(2, '0'));
  const cents = whole * 100n + fraction;

  if (cents <= 0n) {
    throw new Error(`Amount must be at least 0.01: "${amount}"`);
  }
  return cents;
}

export function materializeExpense(
  store: EntityStore,
  userId: string,
  item: ParsedExpenseItem,
  resolved: ResolvedReferences,
  date: string,
): MaterializedExpense {
  const expense = store.createExpense({
    description: item.description || DEFAULT_EXPENSE_DESCRIPTION,
    amountCents: parseAmountCents(item.amount),
    date,
    categoryId: resolved.category?.id,
    groupId: resolved.group?.id,
    paidBy: userId,
    isAiGenerated: true,
  });

  console.log(`[Materialize] Created AI expense ${expense.id}: ${expense.description} - ${formatAmount(expense.amountCents)}`);

  return {
    expense,
    categoryName: resolved.category?.name ?? null,
    categoryIcon: resolved.category?.icon ?? null,
    groupName: resolved.group?.name ?? null,
  };
}

function formatTags(created: MaterializedExpense): string {
  let tags = '';
  if (created.categoryName) {
    tags += ` [${created.categoryName}]`;
  }
  if (created.groupName) {
    tags += ` [Group: ${created.groupName}]`;
  }
  return tags;
}

export function formatExpenseSummary(created: MaterializedExpense[]): string {
  if (created.length === 1) {
    const [only] = created;
    return `✅ Added expense: ${only.expense.description} - ${formatAmount(only.expense.amountCents)}${formatTags(only)}`;
  }

  const lines = created.map(
    c => `• ${c.expense.description} - ${formatAmount(c.expense.amountCents)}${formatTags(c)}`,
  );
  return `✅ Added ${created.length} expenses:\n${lines.join('\n')}`;
}
