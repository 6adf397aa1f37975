import type Database from 'better-sqlite3';
import { DASHBOARD_RECENT_LIMIT, DASHBOARD_TOP_LIMIT, DASHBOARD_WINDOW_DAYS } from '../../config/constants';
import type { CategoryBreakdown, DashboardSummary, GroupBreakdown } from '../../types/analytics';
import { EXPENSE_VIEW_SELECT, type ExpenseRow, toExpenseView } from './entity-store';

export function getDashboardSummary(db: Database.Database, userId: string, today: string): DashboardSummary {
  const totals = db.prepare(`
    SELECT
      COALESCE(SUM(amount_cents), 0) as total,
      COUNT(*) as count
    FROM expenses
    WHERE paid_by = ?
  `).get(userId) as { total: bigint; count: bigint };

  const windowTotal = db.prepare(`
    SELECT COALESCE(SUM(amount_cents), 0) as total
    FROM expenses
    WHERE paid_by = ?
      AND date >= date(?, '-' || ? || ' days')
  `).get(userId, today, DASHBOARD_WINDOW_DAYS) as { total: bigint };

  const recentRows = db.prepare(`
    ${EXPENSE_VIEW_SELECT}
    WHERE e.paid_by = ?
    ORDER BY e.date DESC, e.rowid DESC
    LIMIT ?
  `).all(userId, DASHBOARD_RECENT_LIMIT) as ExpenseRow[];

  const categoryRows = db.prepare(`
    SELECT
      c.name as categoryName,
      c.icon as categoryIcon,
      SUM(e.amount_cents) as total,
      COUNT(e.id) as count
    FROM expenses e
    LEFT JOIN categories c ON e.category_id = c.id
    WHERE e.paid_by = ?
    GROUP BY e.category_id
    ORDER BY total DESC
    LIMIT ?
  `).all(userId, DASHBOARD_TOP_LIMIT) as { categoryName: string | null; categoryIcon: string | null; total: bigint; count: bigint }[];

  const groupRows = db.prepare(`
    SELECT
      g.id as groupId,
      g.name as groupName,
      COALESCE(SUM(e.amount_cents), 0) as total,
      COUNT(e.id) as expenseCount
    FROM expense_groups g
    JOIN group_members m ON m.group_id = g.id
    LEFT JOIN expenses e ON e.group_id = g.id
    WHERE m.user_id = ?
    GROUP BY g.id
    ORDER BY total DESC
    LIMIT ?
  `).all(userId, DASHBOARD_TOP_LIMIT) as { groupId: string; groupName: string; total: bigint; expenseCount: bigint }[];

  const categoryBreakdown: CategoryBreakdown[] = categoryRows.map(row => ({
    categoryName: row.categoryName ?? 'Uncategorized',
    categoryIcon: row.categoryIcon,
    totalCents: row.total,
    count: Number(row.count),
  }));

  const groupBreakdown: GroupBreakdown[] = groupRows.map(row => ({
    groupId: row.groupId,
    groupName: row.groupName,
    totalCents: row.total,
    expenseCount: Number(row.expenseCount),
  }));

  return {
    totalCents: totals.total,
    recentWindowCents: windowTotal.total,
    expenseCount: Number(totals.count),
    recentExpenses: recentRows.map(toExpenseView),
    categoryBreakdown,
    groupBreakdown,
  };
}
