import { describe, it, expect, beforeEach, vi } from 'vitest';
import { processChatExpenseInput } from '../src/services/expense/ai-entry';
import {
  LLMError,
  LLMUnavailableError,
  NoExpensesFoundError,
  ParseError,
  ReconciliationError,
} from '../src/services/expense/errors';
import { GeminiClient } from '../src/services/ai/gemini';
import { countRows, createTestStore, expensesJson, StubLLM, type TestContext } from './helpers';

const TODAY = '2026-10-18';

describe('AI expense entry pipeline', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestStore();
    ctx.store.ensureUser('alice');
  });

  it('should create exactly one AI-generated expense for a single item', async () => {
    const llm = new StubLLM([expensesJson([
      { amount: '12.50', description: 'Lunch', category_name: 'Food', group_name: null, is_new_category: true, suggested_icon: 'restaurant' },
    ])]);

    const result = await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'lunch 12.50', TODAY);

    expect(result.expenses).toHaveLength(1);
    expect(result.message).toBe('✅ Added expense: Lunch - $12.50 [Food]');
    const saved = ctx.store.listExpenses('alice', 10);
    expect(saved).toHaveLength(1);
    expect(saved[0].isAiGenerated).toBe(true);
    expect(saved[0].date).toBe(TODAY);
  });

  it('should split "Spent $45 on gas and $32.75 on lunch" into two expenses with new categories', async () => {
    const llm = new StubLLM([expensesJson([
      { amount: '45.00', description: 'Gas', category_name: 'Fuel', group_name: null, is_new_category: true, suggested_icon: 'local_gas_station' },
      { amount: '32.75', description: 'Lunch', category_name: 'Food', group_name: null, is_new_category: true, suggested_icon: 'restaurant' },
    ])]);

    const result = await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'Spent $45 on gas and $32.75 on lunch', TODAY);

    const saved = result.expenses.map(e => ctx.store.getExpense(e.expense.id));
    expect(saved.map(e => e?.amountCents)).toEqual([4500n, 3275n]);
    expect(saved[0]?.description.toLowerCase()).toContain('gas');
    expect(saved[1]?.description.toLowerCase()).toContain('lunch');
    expect(saved.every(e => e?.isAiGenerated === true)).toBe(true);
    expect(saved.map(e => e?.categoryName)).toEqual(['Fuel', 'Food']);
    expect(ctx.store.listCategories('alice').map(c => c.name)).toEqual(['Food', 'Fuel']);
    expect(result.message).toBe('✅ Added 2 expenses:\n• Gas - $45.00 [Fuel]\n• Lunch - $32.75 [Food]');
  });

  it('should keep amounts beyond double precision exact', async () => {
    const llm = new StubLLM([expensesJson([{ amount: '123456789012345.67', description: 'Yacht' }])]);

    const result = await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'bought a yacht', TODAY);

    expect(result.expenses[0].expense.amountCents).toBe(12345678901234567n);
    expect(result.message).toBe('✅ Added expense: Yacht - $123456789012345.67');
    expect(ctx.store.getExpense(result.expenses[0].expense.id)?.amountCents).toBe(12345678901234567n);
  });

  it('should pass the user\'s taxonomy to the model', async () => {
    ctx.store.getOrCreateCategory('alice', 'Groceries', 'shopping_cart');
    ctx.store.createGroup('alice', 'Weekend Trip');
    const llm = new StubLLM([expensesJson([{ amount: '5', description: 'milk' }])]);

    await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'milk 5', TODAY);

    expect(llm.prompts).toHaveLength(1);
    expect(llm.prompts[0]).toContain('User Input: "milk 5"');
    expect(llm.prompts[0]).toContain('Existing User Groups: Weekend Trip\n');
    expect(llm.prompts[0]).toContain('Existing User Categories: Groceries (shopping_cart)\n');
  });

  it('should resolve a group mentioned in a different case', async () => {
    const group = ctx.store.createGroup('alice', 'Weekend Trip');
    const llm = new StubLLM([expensesJson([
      { amount: '80', description: 'Hotel', category_name: 'Travel', group_name: 'weekend trip', is_new_category: true, suggested_icon: 'hotel' },
    ])]);

    const result = await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'hotel 80 for weekend trip', TODAY);

    expect(result.expenses[0].expense.groupId).toBe(group.id);
    expect(result.message).toBe('✅ Added expense: Hotel - $80.00 [Travel] [Group: Weekend Trip]');
  });

  it('should keep an expense personal when its group is unknown', async () => {
    const llm = new StubLLM([expensesJson([{ amount: '20', description: 'Skis', group_name: 'Ski Club' }])]);

    const result = await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'skis 20 ski club', TODAY);

    expect(result.expenses[0].expense.groupId).toBeUndefined();
    expect(countRows(ctx.db, 'expense_groups')).toBe(0);
  });

  it('should not duplicate a category submitted twice', async () => {
    const reply = expensesJson([{ amount: '3', description: 'Coffee', category_name: 'Coffee', is_new_category: true }]);
    const llm = new StubLLM([reply, reply.replace('"Coffee","is_new', '"coffee","is_new')]);

    await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'coffee 3', TODAY);
    await processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'coffee 3', TODAY);

    expect(countRows(ctx.db, 'categories')).toBe(1);
    expect(countRows(ctx.db, 'expenses')).toBe(2);
  });

  it('should fail with ParseError and save nothing for non-JSON output', async () => {
    const llm = new StubLLM(['I could not find any expense, sorry!']);

    await expect(processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'hello', TODAY))
      .rejects.toBeInstanceOf(ParseError);
    expect(countRows(ctx.db, 'expenses')).toBe(0);
  });

  it('should fail with NoExpensesFound for an empty list', async () => {
    const llm = new StubLLM(['```json\n{"expenses": []}\n```']);

    await expect(processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'hello', TODAY))
      .rejects.toBeInstanceOf(NoExpensesFoundError);
    expect(countRows(ctx.db, 'expenses')).toBe(0);
  });

  it('should report LLMUnavailable when no API key is configured', async () => {
    const llm = new GeminiClient({ apiKey: undefined });

    await expect(processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'lunch 12', TODAY))
      .rejects.toBeInstanceOf(LLMUnavailableError);
  });

  it('should wrap provider failures in LLMError', async () => {
    const llm = new StubLLM([new Error('socket hang up')]);

    await expect(processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'lunch 12', TODAY))
      .rejects.toThrow(new LLMError('AI service error: socket hang up'));
  });

  it('should save nothing when an item fails half-way through a batch', async () => {
    const llm = new StubLLM([expensesJson([
      { amount: '45', description: 'Gas', category_name: 'Fuel', is_new_category: true },
      { amount: '32.75', description: 'Lunch', category_name: 'Food', is_new_category: true },
    ])]);
    const original = ctx.store.createExpense.bind(ctx.store);
    let calls = 0;
    vi.spyOn(ctx.store, 'createExpense').mockImplementation((input) => {
      calls += 1;
      if (calls === 2) {
        throw new Error('database is locked');
      }
      return original(input);
    });

    await expect(processChatExpenseInput({ store: ctx.store, llm }, 'alice', 'gas 45 lunch 32.75', TODAY))
      .rejects.toThrow(new ReconciliationError('Failed to save expense "Lunch": database is locked'));
    expect(countRows(ctx.db, 'expenses')).toBe(0);
    expect(countRows(ctx.db, 'categories')).toBe(0);
  });
});
