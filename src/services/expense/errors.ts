import type { SubmissionState } from '../../types/chat';

/**
 * Base class for every failure that aborts an AI expense submission.
 * `state` is the terminal state the submission ends in.
 */
export abstract class ExpensePipelineError extends Error {
  abstract readonly state: SubmissionState;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class LLMUnavailableError extends ExpensePipelineError {
  readonly state = 'LLMUnavailable' as const;

  constructor() {
    super('AI parsing is not configured (missing GEMINI_API_KEY)');
  }
}

export class LLMError extends ExpensePipelineError {
  readonly state = 'LLMFailed' as const;
}

export class ParseError extends ExpensePipelineError {
  readonly state = 'ParseFailed' as const;

  constructor(message: string, readonly rawText: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NoExpensesFoundError extends ExpensePipelineError {
  readonly state = 'NoExpensesFound' as const;

  constructor() {
    super('No expenses found in the input');
  }
}

export class ReconciliationError extends ExpensePipelineError {
  readonly state = 'ReconciliationFailed' as const;
}
