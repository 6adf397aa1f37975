import type Database from 'better-sqlite3';
import { openDatabase } from '../src/services/database/db';
import { SqliteEntityStore } from '../src/services/database/entity-store';
import type { LLMClient } from '../src/types/ai';

export interface TestContext {
  db: Database.Database;
  store: SqliteEntityStore;
}

export function createTestStore(): TestContext {
  const db = openDatabase(':memory:');
  return { db, store: new SqliteEntityStore(db) };
}

/**
 * LLM stand-in that returns canned replies in order and records every prompt.
 */
export class StubLLM implements LLMClient {
  readonly prompts: string[] = [];

  constructor(private readonly replies: (string | Error)[]) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('StubLLM has no reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function expensesJson(expenses: Record<string, unknown>[]): string {
  return JSON.stringify({ expenses });
}

export function countRows(db: Database.Database, table: 'expenses' | 'categories' | 'expense_groups'): number {
  const row = db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: bigint };
  return Number(row.count);
}
