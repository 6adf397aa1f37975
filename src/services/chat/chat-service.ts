import type { ChatEntry, ChatExpenseSnapshot, ChatReply } from '../../types/chat';
import { todayIso } from '../../utils/date';
import { ExpensePipelineError, ParseError } from '../expense/errors';
import { processChatExpenseInput, type ExpenseEntryDeps } from '../expense/ai-entry';
import type { MaterializedExpense } from '../expense/materializer';
import { formatDecimal, messages } from '../feedback/messages';
import { ChatMessageSchema, validateInput } from '../validation/schemas';
import type { ChatHistoryStore } from './chat-history';

export interface ChatServiceDeps extends ExpenseEntryDeps {
  history: ChatHistoryStore;
  now?: () => Date;
}

function toSnapshot(created: MaterializedExpense): ChatExpenseSnapshot {
  return {
    id: created.expense.id,
    description: created.expense.description,
    amount: formatDecimal(created.expense.amountCents),
    category: created.categoryName,
    categoryIcon: created.categoryIcon,
    group: created.groupName,
  };
}

/**
 * Chat boundary: records the message and the reply in the user's history and
 * turns every pipeline failure into a reply instead of an exception.
 */
export async function handleChatMessage(deps: ChatServiceDeps, userId: string, text: string): Promise<ChatReply> {
  const now = deps.now ?? (() => new Date());
  const validated = validateInput(ChatMessageSchema, text);

  deps.history.append(userId, {
    type: 'user',
    message: validated.valid ? validated.data : text,
    timestamp: now().toISOString(),
  });

  const fail = (state: ChatReply['state'], reason: string): ChatReply => {
    const message = messages.error.chatFailed(reason);
    deps.history.append(userId, {
      type: 'system',
      message,
      timestamp: now().toISOString(),
      isError: true,
    });
    return { ok: false, state, message, expenseIds: [] };
  };

  if (!validated.valid) {
    return fail('Rejected', validated.error);
  }

  try {
    const result = await processChatExpenseInput(deps, userId, validated.data, todayIso(now()));

    const entry: ChatEntry = {
      type: 'system',
      message: result.message,
      timestamp: now().toISOString(),
      expenses: result.expenses.map(toSnapshot),
    };
    deps.history.append(userId, entry);

    console.log(`[Chat] Saved ${result.expenses.length} expense(s) for user ${userId}`);
    return {
      ok: true,
      state: 'Summarized',
      message: result.message,
      expenseIds: result.expenses.map(e => e.expense.id),
    };
  } catch (error) {
    if (error instanceof ExpensePipelineError) {
      console.error(`[Chat] Submission failed (${error.state}):`, error.message);
      if (error instanceof ParseError) {
        console.error(`[Chat] Unparsed AI response:\n${error.rawText}`);
      }
      return fail(error.state, error.message);
    }

    const reason = error instanceof Error ? error.message : String(error);
    console.error('[Chat] Unexpected error:', reason);
    return fail('Failed', messages.error.unexpected);
  }
}
