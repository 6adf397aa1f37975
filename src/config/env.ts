import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  DB_PATH: z.string().default('./data/expenses.db'),
  HEALTH_PORT: z.string().default('5000').transform(Number),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  dotenv.config();

  return envSchema.parse(process.env);
}

export const env = loadEnv();
