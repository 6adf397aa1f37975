import type Database from 'better-sqlite3';
import { generateId } from '../../utils/id';
import type {
  Category,
  CategoryStats,
  CategoryUpdate,
  Expense,
  ExpenseFilter,
  ExpenseUpdate,
  ExpenseView,
  Group,
  GroupDetail,
  GroupUpdate,
  NewExpense,
  User,
} from '../../types/expense';

/**
 * Persistence operations the expense pipeline and the chat surface rely on.
 * All calls are synchronous; `transaction` runs its callback atomically.
 */
export interface EntityStore {
  transaction<T>(fn: () => T): T;

  ensureUser(userId: string, username?: string): User;

  listCategories(userId: string): Category[];
  findCategory(userId: string, name: string): Category | null;
  listCategoryStats(userId: string): CategoryStats[];
  getOrCreateCategory(userId: string, name: string, icon: string): { category: Category; created: boolean };
  updateCategory(userId: string, name: string, changes: CategoryUpdate): Category | null;
  deleteCategory(userId: string, name: string): boolean;

  listUserGroups(userId: string): Group[];
  findGroupForMember(userId: string, name: string): Group | null;
  createGroup(creatorId: string, name: string, description?: string): Group;
  addGroupMember(groupId: string, userId: string): boolean;
  getGroup(groupId: string): GroupDetail | null;
  isGroupMember(groupId: string, userId: string): boolean;
  /** Creator only; returns null when the group is missing or not the caller's. */
  updateGroup(groupId: string, userId: string, changes: GroupUpdate): Group | null;
  /** Creator only. The group's expenses go with it. */
  deleteGroup(groupId: string, userId: string): boolean;
  listGroupExpenses(groupId: string, limit: number): ExpenseView[];

  createExpense(input: NewExpense): Expense;
  getExpense(expenseId: string): ExpenseView | null;
  /** Payer only; returns null when the expense is missing or paid by someone else. */
  updateExpense(expenseId: string, userId: string, changes: ExpenseUpdate): ExpenseView | null;
  deleteExpense(expenseId: string, userId: string): boolean;
  listExpenses(userId: string, limit: number, filter?: ExpenseFilter): ExpenseView[];
}

interface UserRow {
  id: string;
  username: string | null;
  created_at: string;
}

interface CategoryRow {
  id: string;
  user_id: string;
  name: string;
  icon: string;
  created_at: string;
}

interface GroupRow {
  id: string;
  name: string;
  description: string | null;
  created_by: string;
  created_at: string;
}

export interface ExpenseRow {
  id: string;
  description: string;
  amount_cents: bigint;
  date: string;
  category_id: string | null;
  group_id: string | null;
  paid_by: string;
  is_ai_generated: bigint;
  receipt_path: string | null;
  created_at: string;
  category_name?: string | null;
  category_icon?: string | null;
  group_name?: string | null;
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    icon: row.icon,
    createdAt: row.created_at,
  };
}

interface CategoryStatsRow extends CategoryRow {
  expense_count: bigint;
  total: bigint;
}

interface MemberStatsRow {
  user_id: string;
  username: string | null;
  total: bigint;
  count: bigint;
}

function toGroup(row: GroupRow): Group {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? undefined,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

export function toExpenseView(row: ExpenseRow): ExpenseView {
  return {
    id: row.id,
    description: row.description,
    amountCents: row.amount_cents,
    date: row.date,
    categoryId: row.category_id ?? undefined,
    groupId: row.group_id ?? undefined,
    paidBy: row.paid_by,
    isAiGenerated: row.is_ai_generated === 1n,
    receiptPath: row.receipt_path ?? undefined,
    createdAt: row.created_at,
    categoryName: row.category_name ?? undefined,
    categoryIcon: row.category_icon ?? undefined,
    groupName: row.group_name ?? undefined,
  };
}

export const EXPENSE_VIEW_SELECT = `
  SELECT
    e.*,
    c.name as category_name,
    c.icon as category_icon,
    g.name as group_name
  FROM expenses e
  LEFT JOIN categories c ON e.category_id = c.id
  LEFT JOIN expense_groups g ON e.group_id = g.id
`;

export class SqliteEntityStore implements EntityStore {
  constructor(private readonly db: Database.Database) {}

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  ensureUser(userId: string, username?: string): User {
    this.db.prepare(`
      INSERT INTO users (id, username) VALUES (?, ?)
      ON CONFLICT(id) DO UPDATE SET username = COALESCE(excluded.username, users.username)
    `).run(userId, username ?? null);

    const row = this.db.prepare('SELECT * FROM users WHERE id = ?').get(userId) as UserRow;
    return {
      id: row.id,
      username: row.username ?? undefined,
      createdAt: row.created_at,
    };
  }

  listCategories(userId: string): Category[] {
    const rows = this.db.prepare(`
      SELECT * FROM categories WHERE user_id = ? ORDER BY name
    `).all(userId) as CategoryRow[];
    return rows.map(toCategory);
  }

  listCategoryStats(userId: string): CategoryStats[] {
    const rows = this.db.prepare(`
      SELECT
        c.*,
        COUNT(e.id) as expense_count,
        COALESCE(SUM(e.amount_cents), 0) as total
      FROM categories c
      LEFT JOIN expenses e ON e.category_id = c.id
      WHERE c.user_id = ?
      GROUP BY c.id
      ORDER BY c.name
    `).all(userId) as CategoryStatsRow[];

    return rows.map(row => ({
      ...toCategory(row),
      expenseCount: Number(row.expense_count),
      totalCents: row.total,
    }));
  }

  findCategory(userId: string, name: string): Category | null {
    const row = this.db.prepare(`
      SELECT * FROM categories WHERE user_id = ? AND name = ? COLLATE NOCASE
    `).get(userId, name) as CategoryRow | undefined;
    return row ? toCategory(row) : null;
  }

  getOrCreateCategory(userId: string, name: string, icon: string): { category: Category; created: boolean } {
    const result = this.db.prepare(`
      INSERT INTO categories (id, user_id, name, icon) VALUES (?, ?, ?, ?)
      ON CONFLICT(user_id, name) DO NOTHING
    `).run(generateId(), userId, name, icon);

    const category = this.findCategory(userId, name);
    if (!category) {
      throw new Error(`Category "${name}" missing after insert`);
    }
    return { category, created: result.changes === 1 };
  }

  updateCategory(userId: string, name: string, changes: CategoryUpdate): Category | null {
    const existing = this.findCategory(userId, name);
    if (!existing) {
      return null;
    }

    this.db.prepare(`
      UPDATE categories SET name = ?, icon = ? WHERE id = ?
    `).run(changes.name ?? existing.name, changes.icon ?? existing.icon, existing.id);

    const row = this.db.prepare('SELECT * FROM categories WHERE id = ?').get(existing.id) as CategoryRow;
    return toCategory(row);
  }

  deleteCategory(userId: string, name: string): boolean {
    const result = this.db.prepare(`
      DELETE FROM categories WHERE user_id = ? AND name = ? COLLATE NOCASE
    `).run(userId, name);
    return result.changes > 0;
  }

  listUserGroups(userId: string): Group[] {
    const rows = this.db.prepare(`
      SELECT g.* FROM expense_groups g
      JOIN group_members m ON m.group_id = g.id
      WHERE m.user_id = ?
      ORDER BY g.created_at DESC, g.rowid DESC
    `).all(userId) as GroupRow[];
    return rows.map(toGroup);
  }

  findGroupForMember(userId: string, name: string): Group | null {
    const row = this.db.prepare(`
      SELECT g.* FROM expense_groups g
      JOIN group_members m ON m.group_id = g.id
      WHERE m.user_id = ? AND g.name = ? COLLATE NOCASE
      ORDER BY g.rowid
      LIMIT 1
    `).get(userId, name) as GroupRow | undefined;
    return row ? toGroup(row) : null;
  }

  createGroup(creatorId: string, name: string, description?: string): Group {
    const id = generateId();
    this.transaction(() => {
      this.db.prepare(`
        INSERT INTO expense_groups (id, name, description, created_by) VALUES (?, ?, ?, ?)
      `).run(id, name, description ?? null, creatorId);
      this.addGroupMember(id, creatorId);
    });

    const row = this.db.prepare('SELECT * FROM expense_groups WHERE id = ?').get(id) as GroupRow;
    return toGroup(row);
  }

  addGroupMember(groupId: string, userId: string): boolean {
    const result = this.db.prepare(`
      INSERT INTO group_members (group_id, user_id) VALUES (?, ?)
      ON CONFLICT(group_id, user_id) DO NOTHING
    `).run(groupId, userId);
    return result.changes === 1;
  }

  isGroupMember(groupId: string, userId: string): boolean {
    const row = this.db.prepare(`
      SELECT 1 as found FROM group_members WHERE group_id = ? AND user_id = ?
    `).get(groupId, userId);
    return row !== undefined;
  }

  getGroup(groupId: string): GroupDetail | null {
    const row = this.db.prepare('SELECT * FROM expense_groups WHERE id = ?').get(groupId) as GroupRow | undefined;
    if (!row) {
      return null;
    }

    const members = this.db.prepare(`
      SELECT user_id FROM group_members WHERE group_id = ? ORDER BY user_id
    `).all(groupId) as { user_id: string }[];

    const totals = this.db.prepare(`
      SELECT COALESCE(SUM(amount_cents), 0) as total, COUNT(*) as count
      FROM expenses WHERE group_id = ?
    `).get(groupId) as { total: bigint; count: bigint };

    const memberRows = this.db.prepare(`
      SELECT
        m.user_id,
        u.username,
        COALESCE(SUM(e.amount_cents), 0) as total,
        COUNT(e.id) as count
      FROM group_members m
      LEFT JOIN users u ON u.id = m.user_id
      LEFT JOIN expenses e ON e.group_id = m.group_id AND e.paid_by = m.user_id
      WHERE m.group_id = ?
      GROUP BY m.user_id
      ORDER BY m.user_id
    `).all(groupId) as MemberStatsRow[];

    return {
      ...toGroup(row),
      memberIds: members.map(m => m.user_id),
      memberStats: memberRows.map(m => ({
        userId: m.user_id,
        username: m.username ?? undefined,
        totalCents: m.total,
        expenseCount: Number(m.count),
      })),
      totalCents: totals.total,
      expenseCount: Number(totals.count),
    };
  }

  updateGroup(groupId: string, userId: string, changes: GroupUpdate): Group | null {
    const existing = this.db.prepare(`
      SELECT * FROM expense_groups WHERE id = ? AND created_by = ?
    `).get(groupId, userId) as GroupRow | undefined;
    if (!existing) {
      return null;
    }

    const description = changes.description === undefined ? existing.description : changes.description;
    this.db.prepare(`
      UPDATE expense_groups SET name = ?, description = ? WHERE id = ?
    `).run(changes.name ?? existing.name, description, groupId);

    const row = this.db.prepare('SELECT * FROM expense_groups WHERE id = ?').get(groupId) as GroupRow;
    return toGroup(row);
  }

  deleteGroup(groupId: string, userId: string): boolean {
    const result = this.db.prepare('DELETE FROM expense_groups WHERE id = ? AND created_by = ?').run(groupId, userId);
    return result.changes > 0;
  }

  listGroupExpenses(groupId: string, limit: number): ExpenseView[] {
    const rows = this.db.prepare(`
      ${EXPENSE_VIEW_SELECT}
      WHERE e.group_id = ?
      ORDER BY e.date DESC, e.rowid DESC
      LIMIT ?
    `).all(groupId, limit) as ExpenseRow[];
    return rows.map(toExpenseView);
  }

  createExpense(input: NewExpense): Expense {
    const id = generateId();
    this.db.prepare(`
      INSERT INTO expenses (
        id,
        description,
        amount_cents,
        date,
        category_id,
        group_id,
        paid_by,
        is_ai_generated,
        receipt_path
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      input.description,
      input.amountCents,
      input.date,
      input.categoryId ?? null,
      input.groupId ?? null,
      input.paidBy,
      input.isAiGenerated ? 1 : 0,
      input.receiptPath ?? null,
    );

    const row = this.db.prepare('SELECT * FROM expenses WHERE id = ?').get(id) as ExpenseRow;
    return toExpenseView(row);
  }

  getExpense(expenseId: string): ExpenseView | null {
    const row = this.db.prepare(`${EXPENSE_VIEW_SELECT} WHERE e.id = ?`).get(expenseId) as ExpenseRow | undefined;
    return row ? toExpenseView(row) : null;
  }

  updateExpense(expenseId: string, userId: string, changes: ExpenseUpdate): ExpenseView | null {
    const existing = this.db.prepare('SELECT * FROM expenses WHERE id = ? AND paid_by = ?').get(expenseId, userId) as ExpenseRow | undefined;
    if (!existing) {
      return null;
    }

    this.db.prepare(`
      UPDATE expenses
      SET description = ?, amount_cents = ?, category_id = ?, group_id = ?
      WHERE id = ?
    `).run(
      changes.description ?? existing.description,
      changes.amountCents ?? existing.amount_cents,
      changes.categoryId === undefined ? existing.category_id : changes.categoryId,
      changes.groupId === undefined ? existing.group_id : changes.groupId,
      expenseId,
    );

    return this.getExpense(expenseId);
  }

  deleteExpense(expenseId: string, userId: string): boolean {
    const result = this.db.prepare('DELETE FROM expenses WHERE id = ? AND paid_by = ?').run(expenseId, userId);
    return result.changes > 0;
  }

  listExpenses(userId: string, limit: number, filter: ExpenseFilter = {}): ExpenseView[] {
    const conditions = ['e.paid_by = ?'];
    const params: unknown[] = [userId];

    if (filter.categoryId) {
      conditions.push('e.category_id = ?');
      params.push(filter.categoryId);
    }
    if (filter.groupId) {
      conditions.push('e.group_id = ?');
      params.push(filter.groupId);
    }
    if (filter.startDate) {
      conditions.push('e.date >= ?');
      params.push(filter.startDate);
    }
    if (filter.endDate) {
      conditions.push('e.date <= ?');
      params.push(filter.endDate);
    }

    const rows = this.db.prepare(`
      ${EXPENSE_VIEW_SELECT}
      WHERE ${conditions.join(' AND ')}
      ORDER BY e.date DESC, e.rowid DESC
      LIMIT ?
    `).all(...params, limit) as ExpenseRow[];
    return rows.map(toExpenseView);
  }
}
