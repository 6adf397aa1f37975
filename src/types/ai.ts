/**
 * Text-generation capability used by the expense extraction pipeline.
 */
export interface LLMClient {
  generate(prompt: string): Promise<string>;
}

export interface PromptGroup {
  name: string;
}

export interface PromptCategory {
  name: string;
  icon: string;
}
