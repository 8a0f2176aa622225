import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const EnvSchema = z.object({
  MODEL: z.string().min(1).default('gpt-4o-mini'),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  MAX_ITERATIONS: z.coerce.number().int().positive().default(5),
  HISTORY_MAX_TURNS: z.coerce.number().int().positive().default(20),
  SESSION_IDLE_MINUTES: z.coerce.number().positive().default(60),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FILE: z.string().default('debug.log'),
});

export interface AppConfig {
  model: string;
  temperature: number;
  maxIterations: number;
  historyMaxTurns: number;
  sessionIdleMinutes: number;
  maxSessions: number;
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  /** Empty string disables file logging. */
  logFile: string;
}

/**
 * Parse configuration from an environment map. Blank values count as unset so
 * that `MODEL=` in a .env file falls back to the default; a blank `LOG_FILE`
 * is kept and turns file logging off.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key === 'LOG_FILE' || (value !== undefined && value.trim() !== ''))
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    model: values.MODEL,
    temperature: values.MODEL_TEMPERATURE,
    maxIterations: values.MAX_ITERATIONS,
    historyMaxTurns: values.HISTORY_MAX_TURNS,
    sessionIdleMinutes: values.SESSION_IDLE_MINUTES,
    maxSessions: values.MAX_SESSIONS,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    logFile: values.LOG_FILE,
  };
}
