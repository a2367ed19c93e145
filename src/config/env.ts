/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  // Medium (RapidAPI)
  RAPIDAPI_KEY: z.string().optional(),
  RAPIDAPI_HOST: z.string().default('medium2.p.rapidapi.com'),
  RAPIDAPI_MONTHLY_LIMIT: z.coerce.number().int().positive().default(2500),

  // WordPress
  WORDPRESS_URL: z.string().url().optional(),
  WORDPRESS_USERNAME: z.string().optional(),
  WORDPRESS_PASSWORD: z.string().optional(), // Application password, not the login one

  // OpenAI
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),

  // Settings defaults (used until data/settings.json exists)
  SEARCH_KEYWORDS: z.string().default('python,javascript,react,nodejs,AI,machine learning'),
  MAX_ARTICLES_PER_RUN: z.coerce.number().int().positive().default(2),
  RECENT_DAYS: z.coerce.number().int().positive().default(30),
  LANGUAGE_PREFERENCE: z.enum(['en', 'pt', 'both']).default('both'),
  AUTO_TRANSLATE: booleanFlag,
  TARGET_LANGUAGE: z.string().default('pt'),
  POST_STATUS: z.enum(['draft', 'publish', 'pending']).default('draft'),
  CATEGORY_NAME: z.string().default('Technology'),

  // Scheduling
  SCHEDULE_HOUR: z.coerce.number().int().min(0).max(23).default(8),
  SCHEDULE_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  TZ: z.string().default('America/Sao_Paulo'),

  // Storage
  DB_PATH: z.string().default('./data/sync.db'),
  SETTINGS_PATH: z.string().default('./data/settings.json'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: z.string().default('./logs/app.log'),

  // Dashboard
  DASHBOARD_PORT: z.coerce.number().int().positive().default(5001),
  DASHBOARD_TOKEN: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
