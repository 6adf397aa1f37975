import type { LLMClient } from '../../types/ai';
import { todayIso } from '../../utils/date';
import { buildExpenseParsingPrompt } from '../ai/prompt-builder';
import { parseExpenseResponse } from '../ai/response-parser';
import type { EntityStore } from '../database/entity-store';
import { ExpensePipelineError, LLMError, NoExpensesFoundError, ReconciliationError } from './errors';
import { formatExpenseSummary, materializeExpense, type MaterializedExpense } from './materializer';
import { reconcileItem } from './reconciliation';

export interface ExpenseEntryDeps {
  store: EntityStore;
  llm: LLMClient;
}

export interface ChatExpenseResult {
  expenses: MaterializedExpense[];
  message: string;
}

async function callModel(llm: LLMClient, prompt: string): Promise<string> {
  try {
    return await llm.generate(prompt);
  } catch (error) {
    if (error instanceof ExpensePipelineError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new LLMError(`AI service error: ${reason}`, { cause: error });
  }
}

/**
 * Turn one chat message into persisted expenses.
 *
 * Every extracted item is reconciled and saved inside one store transaction,
 * so a failure on any item leaves neither expenses nor lazily created
 * categories behind.
 */
export async function processChatExpenseInput(
  deps: ExpenseEntryDeps,
  userId: string,
  text: string,
  date: string = todayIso(),
): Promise<ChatExpenseResult> {
  const { store, llm } = deps;

  const groups = store.listUserGroups(userId).map(g => ({ name: g.name }));
  const categories = store.listCategories(userId).map(c => ({ name: c.name, icon: c.icon }));
  const prompt = buildExpenseParsingPrompt(text, groups, categories);

  const rawText = await callModel(llm, prompt);

  const items = parseExpenseResponse(rawText);
  if (items.length === 0) {
    throw new NoExpensesFoundError();
  }
  console.log(`[AIEntry] Parsed ${items.length} expense(s) for user ${userId}`);

  const created = store.transaction(() =>
    items.map(item => {
      const resolved = reconcileItem(store, userId, item);
      try {
        return materializeExpense(store, userId, item, resolved, date);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ReconciliationError(`Failed to save expense "${item.description}": ${reason}`, { cause: error });
      }
    }),
  );

  return {
    expenses: created,
    message: formatExpenseSummary(created),
  };
}
