import { config } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_LLM_CONCURRENCY, DEFAULT_LLM_MODEL, DEFAULT_LLM_TIMEOUT_MS } from './constants';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),
  TAXONOMY_PATH: z.string().default('taxonomy_release.txt'),
  LLM_PROVIDER: z.enum(['gemini']).default('gemini'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default(DEFAULT_LLM_MODEL),
  LLM_TIMEOUT_MS: z.string().default(String(DEFAULT_LLM_TIMEOUT_MS)).transform(Number).pipe(z.number().int().positive()),
  LLM_CONCURRENCY: z.string().default(String(DEFAULT_LLM_CONCURRENCY)).transform(Number).pipe(z.number().int().min(1)),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = parseEnv(process.env);
