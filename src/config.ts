/**
 * @fileoverview Environment-driven configuration for the API and the intake UI
 */

import 'dotenv/config';
import { resolve } from 'node:path';
import { z } from 'zod';
import { SEVERITIES, Severity } from '@triage/support';

export const PROJECT_ROOT = resolve(__dirname, '..');
export const DEFAULT_MODEL = 'llama-3.1-8b-instant';

const flag = z
  .string()
  .trim()
  .transform((value) => ['1', 'true', 'yes'].includes(value.toLowerCase()));

const port = z.coerce.number().int().min(0).max(65535);

const envSchema = z.object({
  GROQ_API_KEY: z.string().trim().optional(),
  GROQ_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  GROQ_BASE_URL: z.string().url().optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  FIREBASE_CREDENTIALS: z.string().trim().optional(),
  ALLOW_LOCAL_FALLBACK: flag.default('1'),
  LOCAL_FALLBACK_PATH: z.string().default('data/ticket_results.jsonl'),
  KB_PATH: z.string().default('data/knowledge_base.json'),
  DEFAULT_SEVERITY: z.enum(SEVERITIES).default('Medium'),
  PORT: port.default(8000),
  UI_PORT: port.default(8501),
  TRIAGE_API_BASE: z.string().url().default('http://localhost:8000'),
});

export interface AppConfig {
  llm: {
    apiKey: string | null;
    model: string;
    baseURL?: string;
    timeoutMs: number;
  };
  firebase: {
    credentialsPath?: string;
    defaultCredentialsPath: string;
  };
  storage: {
    allowLocalFallback: boolean;
    localFallbackPath: string;
  };
  kbPath: string;
  defaultSeverity: Severity;
  port: number;
  uiPort: number;
  apiBase: string;
}

/**
 * Validate an environment map and build the typed configuration.
 * Relative paths resolve against the project root.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, root: string = PROJECT_ROOT): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    llm: {
      apiKey: e.GROQ_API_KEY || null,
      model: e.GROQ_MODEL,
      baseURL: e.GROQ_BASE_URL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    firebase: {
      credentialsPath: e.FIREBASE_CREDENTIALS ? resolve(root, e.FIREBASE_CREDENTIALS) : undefined,
      defaultCredentialsPath: resolve(root, 'firebase_key.json'),
    },
    storage: {
      allowLocalFallback: e.ALLOW_LOCAL_FALLBACK,
      localFallbackPath: resolve(root, e.LOCAL_FALLBACK_PATH),
    },
    kbPath: resolve(root, e.KB_PATH),
    defaultSeverity: e.DEFAULT_SEVERITY,
    port: e.PORT,
    uiPort: e.UI_PORT,
    apiBase: e.TRIAGE_API_BASE,
  };
}
