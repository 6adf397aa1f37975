import type { ExpenseView } from './expense';

export interface CategoryBreakdown {
  categoryName: string;
  categoryIcon: string | null;
  totalCents: bigint;
  count: number;
}

export interface GroupBreakdown {
  groupId: string;
  groupName: string;
  totalCents: bigint;
  expenseCount: number;
}

export interface DashboardSummary {
  totalCents: bigint;
  recentWindowCents: bigint;
  expenseCount: number;
  recentExpenses: ExpenseView[];
  categoryBreakdown: CategoryBreakdown[];
  groupBreakdown: GroupBreakdown[];
}
