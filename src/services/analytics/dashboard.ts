import { DASHBOARD_WINDOW_DAYS } from '../../config/constants';
import type { DashboardSummary } from '../../types/analytics';
import type { ExpenseView } from '../../types/expense';
import { formatAmount } from '../feedback/messages';

export function formatExpenseLine(expense: ExpenseView): string {
  let line = `${expense.date} ${expense.description} - ${formatAmount(expense.amountCents)}`;
  if (expense.categoryName) {
    line += ` [${expense.categoryName}]`;
  }
  if (expense.groupName) {
    line += ` [Group: ${expense.groupName}]`;
  }
  if (expense.isAiGenerated) {
    line += ' (AI)';
  }
  return line;
}

export function formatDashboard(summary: DashboardSummary): string {
  let report = 'SPENDING SUMMARY\n\n';
  report += `Total: ${formatAmount(summary.totalCents)} (${summary.expenseCount} expenses)\n`;
  report += `Last ${DASHBOARD_WINDOW_DAYS} days: ${formatAmount(summary.recentWindowCents)}\n`;

  if (summary.categoryBreakdown.length > 0) {
    report += '\nTop Categories:\n';
    for (const cat of summary.categoryBreakdown) {
      report += `- ${cat.categoryName}: ${formatAmount(cat.totalCents)} (${cat.count})\n`;
    }
  }

  if (summary.groupBreakdown.length > 0) {
    report += '\nGroups:\n';
    for (const group of summary.groupBreakdown) {
      report += `- ${group.groupName}: ${formatAmount(group.totalCents)} (${group.expenseCount})\n`;
    }
  }

  if (summary.recentExpenses.length > 0) {
    report += '\nRecent:\n';
    for (const expense of summary.recentExpenses) {
      report += `- ${formatExpenseLine(expense)}\n`;
    }
  }

  return report.trimEnd();
}
