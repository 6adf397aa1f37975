export { GeminiClient, createLLMClient } from './gemini';
export { buildExpenseParsingPrompt } from './prompt-builder';
export { parseExpenseResponse, stripCodeFence } from './response-parser';
export type { LLMClient, PromptCategory, PromptGroup } from '../../types/ai';
