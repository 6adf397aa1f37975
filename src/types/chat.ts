export type SubmissionState =
  | 'Received'
  | 'Prompted'
  | 'LLMResponded'
  | 'Parsed'
  | 'Reconciled'
  | 'Materialized'
  | 'Summarized'
  | 'LLMUnavailable'
  | 'LLMFailed'
  | 'ParseFailed'
  | 'NoExpensesFound'
  | 'ReconciliationFailed'
  | 'Rejected'
  | 'Failed';

export interface ChatExpenseSnapshot {
  id: string;
  description: string;
  amount: string;
  category: string | null;
  categoryIcon: string | null;
  group: string | null;
}

export interface ChatEntry {
  type: 'user' | 'system';
  message: string;
  timestamp: string;
  expenses?: ChatExpenseSnapshot[];
  isError?: boolean;
}

export interface ChatReply {
  ok: boolean;
  state: SubmissionState;
  message: string;
  expenseIds: string[];
}
