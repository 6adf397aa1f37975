export interface User {
  id: string;
  username?: string;
  createdAt: string;
}

export interface Category {
  id: string;
  userId: string;
  name: string;
  icon: string;
  createdAt: string;
}

export interface Group {
  id: string;
  name: string;
  description?: string;
  createdBy: string;
  createdAt: string;
}

export interface CategoryStats extends Category {
  expenseCount: number;
  totalCents: bigint;
}

export interface CategoryUpdate {
  name?: string;
  icon?: string;
}

export interface MemberStats {
  userId: string;
  username?: string;
  totalCents: bigint;
  expenseCount: number;
}

export interface GroupDetail extends Group {
  memberIds: string[];
  memberStats: MemberStats[];
  totalCents: bigint;
  expenseCount: number;
}

export interface GroupUpdate {
  name?: string;
  description?: string | null;
}

export interface Expense {
  id: string;
  description: string;
  amountCents: bigint;
  date: string;
  categoryId?: string;
  groupId?: string;
  paidBy: string;
  isAiGenerated: boolean;
  receiptPath?: string;
  createdAt: string;
}

export interface NewExpense {
  description: string;
  amountCents: bigint;
  date: string;
  categoryId?: string;
  groupId?: string;
  paidBy: string;
  isAiGenerated: boolean;
  receiptPath?: string;
}

/**
 * Changes to an existing expense. `null` clears a reference, `undefined` leaves it as is.
 */
export interface ExpenseUpdate {
  description?: string;
  amountCents?: bigint;
  categoryId?: string | null;
  groupId?: string | null;
}

export interface ExpenseFilter {
  categoryId?: string;
  groupId?: string;
  startDate?: string;
  endDate?: string;
}

/**
 * An expense joined with the names of its category and group, as shown to users.
 */
export interface ExpenseView extends Expense {
  categoryName?: string;
  categoryIcon?: string;
  groupName?: string;
}

/**
 * One expense as extracted from model output, before any lookup or persistence.
 */
export interface ParsedExpenseItem {
  amount: string;
  description: string;
  categoryName?: string;
  groupName?: string;
  isNewCategory: boolean;
  suggestedIcon?: string;
}

export interface ResolvedReferences {
  category: Category | null;
  group: Group | null;
}
