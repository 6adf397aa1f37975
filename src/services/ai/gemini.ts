import { GoogleGenerativeAI } from '@google/generative-ai';
import { GEMINI_MAX_RETRIES, GEMINI_MODEL, GEMINI_RESPONSE_TIMEOUT_MS } from '../../config/constants';
import type { LLMClient } from '../../types/ai';
import { LLMError, LLMUnavailableError } from '../expense/errors';

export interface GeminiClientOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export class GeminiClient implements LLMClient {
  private genAI: GoogleGenerativeAI | null = null;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(private readonly options: GeminiClientOptions = {}) {
    this.model = options.model ?? GEMINI_MODEL;
    this.timeoutMs = options.timeoutMs ?? GEMINI_RESPONSE_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? GEMINI_MAX_RETRIES;
  }

  isConfigured(): boolean {
    return !!this.options.apiKey;
  }

  private getClient(): GoogleGenerativeAI {
    if (!this.options.apiKey) {
      throw new LLMUnavailableError();
    }
    if (!this.genAI) {
      this.genAI = new GoogleGenerativeAI(this.options.apiKey);
    }
    return this.genAI;
  }

  async generate(prompt: string): Promise<string> {
    const client = this.getClient();
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      let timer: NodeJS.Timeout | undefined;
      try {
        const model = client.getGenerativeModel({ model: this.model });
        const timeout = new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Gemini API timeout')), this.timeoutMs);
        });

        const result = await Promise.race([model.generateContent(prompt), timeout]);
        const text = result.response.text();

        console.log('[Gemini] Response generated successfully');
        return text;
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Gemini] Attempt ${attempt + 1} failed:`, message);

        if (message.includes('429')) {
          throw new LLMError('Gemini API quota exceeded', { cause: error });
        }

        if (attempt < this.maxRetries - 1) {
          await new Promise(resolve => setTimeout(resolve, Math.pow(2, attempt) * 1000));
        }
      } finally {
        clearTimeout(timer);
      }
    }

    const reason = lastError instanceof Error ? lastError.message : 'unknown error';
    throw new LLMError(`Gemini API failed after retries: ${reason}`, { cause: lastError });
  }
}

export function createLLMClient(apiKey?: string): GeminiClient {
  if (!apiKey) {
    console.log('[Gemini] No API key configured, AI expense parsing disabled');
  }
  return new GeminiClient({ apiKey });
}
