import type Database from 'better-sqlite3';
import { DEFAULT_CATEGORY_ICON } from '../../config/constants';
import type { ExpenseFilter, ExpenseUpdate, ExpenseView, GroupDetail } from '../../types/expense';
import { todayIso } from '../../utils/date';
import { formatDashboard, formatExpenseLine } from '../analytics';
import type { ChatHistoryStore } from '../chat/chat-history';
import { getDashboardSummary } from '../database/expense-queries';
import type { EntityStore } from '../database/entity-store';
import { addManualExpense, parseManualEntry, UnknownCategoryError } from '../expense/manual-entry';
import { formatAmount, messages } from '../feedback/messages';
import {
  AmountSchema,
  CategoryNameSchema,
  DateSchema,
  ExpenseDescriptionSchema,
  GroupDescriptionSchema,
  GroupNameSchema,
  IconSchema,
  validateInput,
} from '../validation/schemas';

export interface CommandDeps {
  db: Database.Database;
  store: EntityStore;
  history: ChatHistoryStore;
}

const RECENT_EXPENSES_LIMIT = 15;
const GROUP_EXPENSES_LIMIT = 10;
const HISTORY_PREVIEW_LIMIT = 10;

const FILTER_KEYS = ['category', 'group', 'from', 'to'] as const;
const EDIT_KEYS = ['amount', 'description', 'category', 'group'] as const;

// Clears a category or group reference in /edit
const NONE = 'none';

const EXPENSES_USAGE = 'Usage: /expenses [category=<name>] [group=<name>] [from=YYYY-MM-DD] [to=YYYY-MM-DD]';
const EDIT_USAGE = 'Usage: /edit <expense id> [amount=<amount>] [description=<text>] [category=<name|none>] [group=<name|none>]';

/**
 * Parse "key=value key=value" where a value may contain spaces and runs until
 * the next known key. Returns null if anything else is left over.
 */
export function parseOptions<K extends string>(args: string, keys: readonly K[]): Partial<Record<K, string>> | null {
  const text = args.trim();
  if (!text) {
    return {};
  }

  const alternatives = keys.join('|');
  const pattern = new RegExp(`(?:^|\\s)(${alternatives})=(.*?)(?=\\s+(?:${alternatives})=|$)`, 'g');

  const options: Partial<Record<K, string>> = {};
  for (const match of text.matchAll(pattern)) {
    const key = keys.find(k => k === match[1]);
    if (key) {
      options[key] = (match[2] ?? '').trim();
    }
  }

  return text.replace(pattern, '').trim() ? null : options;
}

export function summaryCommand(deps: CommandDeps, userId: string, today: string = todayIso()): string {
  const summary = getDashboardSummary(deps.db, userId, today);
  if (summary.expenseCount === 0) {
    return messages.error.noData;
  }
  return formatDashboard(summary);
}

/**
 * /expenses [category=<name>] [group=<name>] [from=YYYY-MM-DD] [to=YYYY-MM-DD]
 */
export function expensesCommand(deps: CommandDeps, userId: string, args = ''): string {
  const options = parseOptions(args, FILTER_KEYS);
  if (!options) {
    return EXPENSES_USAGE;
  }

  const filter: ExpenseFilter = {};

  if (options.category !== undefined) {
    const category = deps.store.findCategory(userId, options.category);
    if (!category) {
      return messages.error.categoryNotFound(options.category);
    }
    filter.categoryId = category.id;
  }

  if (options.group !== undefined) {
    const group = deps.store.findGroupForMember(userId, options.group);
    if (!group) {
      return messages.error.groupNotJoined(options.group);
    }
    filter.groupId = group.id;
  }

  for (const [key, field] of [['from', 'startDate'], ['to', 'endDate']] as const) {
    const value = options[key];
    if (value === undefined) {
      continue;
    }
    const date = validateInput(DateSchema, value);
    if (!date.valid) {
      return `${date.error}\n${EXPENSES_USAGE}`;
    }
    filter[field] = date.data;
  }

  const expenses = deps.store.listExpenses(userId, RECENT_EXPENSES_LIMIT, filter);
  if (expenses.length === 0) {
    return Object.keys(filter).length > 0 ? messages.info.noMatchingExpenses : messages.error.noData;
  }
  return expenses.map(e => `${formatExpenseLine(e)}\n  id: ${e.id}`).join('\n');
}

export function addExpenseCommand(deps: CommandDeps, userId: string, args: string, today: string = todayIso()): string {
  const parsed = parseManualEntry(args);
  if (!parsed.valid) {
    return `${parsed.error}\nUsage: /add 12.50 lunch #Food`;
  }

  try {
    const expense = addManualExpense(deps.store, userId, parsed.data, today);
    return messages.success.manualExpenseAdded(expense.description, formatAmount(expense.amountCents));
  } catch (error) {
    if (error instanceof UnknownCategoryError) {
      return messages.error.categoryNotFound(error.categoryName);
    }
    throw error;
  }
}

/**
 * /edit <expense id> [amount=..] [description=..] [category=<name|none>] [group=<name|none>]
 */
export function editExpenseCommand(deps: CommandDeps, userId: string, args: string): string {
  const [expenseId = '', ...rest] = args.trim().split(/\s+/);
  const options = parseOptions(rest.join(' '), EDIT_KEYS);
  if (!expenseId || !options || Object.keys(options).length === 0) {
    return EDIT_USAGE;
  }

  const changes: ExpenseUpdate = {};

  if (options.amount !== undefined) {
    const amount = validateInput(AmountSchema, options.amount);
    if (!amount.valid) {
      return amount.error;
    }
    changes.amountCents = amount.data;
  }

  if (options.description !== undefined) {
    const description = validateInput(ExpenseDescriptionSchema, options.description);
    if (!description.valid) {
      return description.error;
    }
    changes.description = description.data;
  }

  if (options.category !== undefined) {
    if (options.category.toLowerCase() === NONE) {
      changes.categoryId = null;
    } else {
      const category = deps.store.findCategory(userId, options.category);
      if (!category) {
        return messages.error.categoryNotFound(options.category);
      }
      changes.categoryId = category.id;
    }
  }

  if (options.group !== undefined) {
    if (options.group.toLowerCase() === NONE) {
      changes.groupId = null;
    } else {
      const group = deps.store.findGroupForMember(userId, options.group);
      if (!group) {
        return messages.error.groupNotJoined(options.group);
      }
      changes.groupId = group.id;
    }
  }

  const updated = deps.store.updateExpense(expenseId, userId, changes);
  return updated ? messages.success.expenseUpdated(formatExpenseLine(updated)) : messages.error.expenseNotFound;
}

export function deleteExpenseCommand(deps: CommandDeps, userId: string, expenseId: string): string {
  if (!expenseId) {
    return 'Usage: /delete <expense id>';
  }
  return deps.store.deleteExpense(expenseId, userId) ? messages.success.expenseDeleted : messages.error.expenseNotFound;
}

export function categoriesCommand(deps: CommandDeps, userId: string): string {
  const categories = deps.store.listCategoryStats(userId);
  if (categories.length === 0) {
    return messages.info.noCategories;
  }
  return 'Your categories:\n' + categories
    .map(c => `- ${c.name} (${c.icon}): ${formatAmount(c.totalCents)} (${c.expenseCount})`)
    .join('\n');
}

const CATEGORY_USAGE = [
  'Usage:',
  '/category add <name> [icon=<icon>]',
  '/category rename <name> = <new name>',
  '/category icon <name> <icon>',
  '/category delete <name>',
].join('\n');

/**
 * /category add <name> [icon=<material_symbol>]
 * /category rename <name> = <new name>
 * /category icon <name> <material_symbol>
 * /category delete <name>
 */
export function categoryCommand(deps: CommandDeps, userId: string, args: string): string {
  const [action, ...rest] = args.trim().split(/\s+/);

  if (action === 'add') {
    let icon = DEFAULT_CATEGORY_ICON;
    const last = rest[rest.length - 1];
    if (last?.startsWith('icon=')) {
      const validIcon = validateInput(IconSchema, last.slice('icon='.length));
      if (!validIcon.valid) {
        return validIcon.error;
      }
      icon = validIcon.data;
      rest.pop();
    }

    const name = validateInput(CategoryNameSchema, rest.join(' '));
    if (!name.valid) {
      return `${name.error}\nUsage: /category add <name> [icon=<icon>]`;
    }

    const { category, created } = deps.store.getOrCreateCategory(userId, name.data, icon);
    return created
      ? messages.success.categoryAdded(category.name, category.icon)
      : messages.error.categoryExists(category.name, category.icon);
  }

  if (action === 'rename') {
    const separator = rest.indexOf('=');
    const current = rest.slice(0, separator).join(' ');
    const next = validateInput(CategoryNameSchema, rest.slice(separator + 1).join(' '));
    if (separator < 1 || !next.valid) {
      return 'Usage: /category rename <name> = <new name>';
    }

    const existing = deps.store.findCategory(userId, current);
    if (!existing) {
      return messages.error.categoryNotFound(current);
    }
    const clash = deps.store.findCategory(userId, next.data);
    if (clash && clash.id !== existing.id) {
      return messages.error.categoryExists(clash.name, clash.icon);
    }

    const updated = deps.store.updateCategory(userId, current, { name: next.data });
    return updated ? messages.success.categoryUpdated(updated.name, updated.icon) : messages.error.categoryNotFound(current);
  }

  if (action === 'icon') {
    const icon = validateInput(IconSchema, rest.pop() ?? '');
    const name = rest.join(' ');
    if (!name) {
      return 'Usage: /category icon <name> <icon>';
    }
    if (!icon.valid) {
      return icon.error;
    }

    const updated = deps.store.updateCategory(userId, name, { icon: icon.data });
    return updated ? messages.success.categoryUpdated(updated.name, updated.icon) : messages.error.categoryNotFound(name);
  }

  if (action === 'delete') {
    const name = rest.join(' ').trim();
    if (!name) {
      return 'Usage: /category delete <name>';
    }
    return deps.store.deleteCategory(userId, name)
      ? messages.success.categoryDeleted(name)
      : messages.error.categoryNotFound(name);
  }

  return CATEGORY_USAGE;
}

export function groupsCommand(deps: CommandDeps, userId: string): string {
  const groups = deps.store.listUserGroups(userId);
  if (groups.length === 0) {
    return messages.info.noGroups;
  }
  return 'Your groups:\n' + groups.map(g => `- ${g.name} (id: ${g.id})`).join('\n');
}

function formatGroupDetail(group: GroupDetail, expenses: ExpenseView[]): string {
  const names = new Map(group.memberStats.map(m => [m.userId, m.username ?? m.userId]));

  let text = `${group.name}\n`;
  if (group.description) {
    text += `${group.description}\n`;
  }
  text += `Total: ${formatAmount(group.totalCents)} (${group.expenseCount} expenses)\n`;

  text += `\nMembers (${group.memberStats.length}):\n`;
  for (const member of group.memberStats) {
    text += `- ${member.username ?? member.userId}: ${formatAmount(member.totalCents)} (${member.expenseCount})\n`;
  }

  if (expenses.length > 0) {
    text += '\nExpenses:\n';
    for (const expense of expenses) {
      text += `- ${expense.date} ${expense.description} - ${formatAmount(expense.amountCents)}`;
      if (expense.categoryName) {
        text += ` [${expense.categoryName}]`;
      }
      text += ` paid by ${names.get(expense.paidBy) ?? expense.paidBy}\n`;
    }
  }

  return text.trimEnd();
}

const GROUP_USAGE = [
  'Usage:',
  '/group create <name>',
  '/group join <id>',
  '/group <id>',
  '/group rename <id> <name>',
  '/group describe <id> <text>',
  '/group delete <id>',
].join('\n');

// Creator-only update that tells "missing" apart from "not yours"
function creatorOnly(deps: CommandDeps, groupId: string, run: () => string | null): string {
  if (!deps.store.getGroup(groupId)) {
    return messages.error.groupNotFound;
  }
  return run() ?? messages.error.notGroupCreator;
}

/**
 * /group create <name>
 * /group join <id>
 * /group rename <id> <name>
 * /group describe <id> [text]
 * /group delete <id>
 * /group <id>
 */
export function groupCommand(deps: CommandDeps, userId: string, args: string): string {
  const [action, ...rest] = args.trim().split(/\s+/);

  if (action === 'create') {
    const name = validateInput(GroupNameSchema, rest.join(' '));
    if (!name.valid) {
      return `${name.error}\nUsage: /group create <name>`;
    }
    const group = deps.store.createGroup(userId, name.data);
    return messages.success.groupCreated(group.name, group.id);
  }

  if (action === 'join') {
    const group = rest[0] ? deps.store.getGroup(rest[0]) : null;
    if (!group) {
      return messages.error.groupNotFound;
    }
    return deps.store.addGroupMember(group.id, userId)
      ? messages.success.groupJoined(group.name)
      : messages.error.alreadyMember;
  }

  if (action === 'rename') {
    const [groupId = '', ...words] = rest;
    const name = validateInput(GroupNameSchema, words.join(' '));
    if (!groupId || !name.valid) {
      return 'Usage: /group rename <id> <name>';
    }
    return creatorOnly(deps, groupId, () => {
      const updated = deps.store.updateGroup(groupId, userId, { name: name.data });
      return updated && messages.success.groupUpdated(updated.name);
    });
  }

  if (action === 'describe') {
    const [groupId = '', ...words] = rest;
    const description = validateInput(GroupDescriptionSchema, words.join(' '));
    if (!groupId || !description.valid) {
      return description.valid ? 'Usage: /group describe <id> [text]' : description.error;
    }
    return creatorOnly(deps, groupId, () => {
      const updated = deps.store.updateGroup(groupId, userId, { description: description.data || null });
      return updated && messages.success.groupUpdated(updated.name);
    });
  }

  if (action === 'delete') {
    const groupId = rest[0];
    if (!groupId) {
      return 'Usage: /group delete <id>';
    }
    const group = deps.store.getGroup(groupId);
    if (!group) {
      return messages.error.groupNotFound;
    }
    return deps.store.deleteGroup(groupId, userId)
      ? messages.success.groupDeleted(group.name)
      : messages.error.notGroupCreator;
  }

  if (!action) {
    return GROUP_USAGE;
  }

  const group = deps.store.getGroup(action);
  if (!group) {
    return messages.error.groupNotFound;
  }
  if (!deps.store.isGroupMember(group.id, userId)) {
    return messages.error.notGroupMember;
  }

  return formatGroupDetail(group, deps.store.listGroupExpenses(group.id, GROUP_EXPENSES_LIMIT));
}

export function historyCommand(deps: CommandDeps, userId: string): string {
  const entries = deps.history.get(userId).slice(-HISTORY_PREVIEW_LIMIT);
  if (entries.length === 0) {
    return messages.info.noHistory;
  }
  return entries.map(e => `${e.type === 'user' ? 'You' : 'Bot'}: ${e.message}`).join('\n');
}

export function clearHistoryCommand(deps: CommandDeps, userId: string): string {
  deps.history.clear(userId);
  return messages.success.historyCleared;
}
