import fs from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_PREDICTION_POLICY } from './pipeline/tip-predictor.js';
import type { PredictionPolicy } from './types/prediction.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  KICKTIPP_EMAIL: z.string().min(1),
  KICKTIPP_PASSWORD: z.string().min(1),
  KICKTIPP_NAME_OF_COMPETITION: z.string().min(1),
  KICKTIPP_BASE_URL: z.string().url().default('https://www.kicktipp.de'),
  KICKTIPP_HOURS_UNTIL_GAME: z.coerce.number().positive().default(2),
  KICKTIPP_RUN_EVERY_X_MINUTES: z.coerce.number().int().min(0).default(60),
  OVERWRITE_TIPS: booleanFlag,

  BROWSER_EXECUTABLE_PATH: optionalString,
  SITE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SUBMIT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SUBMIT_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  PREDICTION_POLICY_FILE: optionalString,

  WEBHOOK_URL: optionalString,
  ZAPIER_URL: optionalString,
  NTFY_URL: optionalString,
  NTFY_USERNAME: optionalString,
  NTFY_PASSWORD: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  HEARTBEAT_URL: optionalString,
  HEALTH_PORT: z.coerce.number().int().min(0).default(8080),
});

export type Env = z.infer<typeof envSchema>;

const scorelineSchema = z.object({
  home: z.number().int().min(0),
  away: z.number().int().min(0),
});

export const predictionPolicySchema = z.object({
  drawThreshold: z.number().min(0).max(1),
  tieEpsilon: z.number().min(0).default(1e-9),
  tiers: z
    .array(
      z.object({
        name: z.string().min(1),
        maxMargin: z.number().positive(),
        scorelines: z.object({
          home: scorelineSchema,
          draw: scorelineSchema,
          away: scorelineSchema,
        }),
      }),
    )
    .min(1),
});

export interface Config {
  env: Env;
  credentials: { email: string; password: string };
  competition: string;
  baseUrl: string;
  leadTimeHours: number;
  intervalMinutes: number;
  overwriteTips: boolean;
  browser: { executablePath: string | undefined; timeoutMs: number };
  retry: { maxAttempts: number; baseDelayMs: number };
  policy: PredictionPolicy;
}

export function loadPredictionPolicy(filePath: string): PredictionPolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read prediction policy ${filePath}: ${String(err)}`);
  }

  const parsed = predictionPolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid prediction policy ${filePath}`,
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }

  const tiers = [...parsed.data.tiers].sort((a, b) => a.maxMargin - b.maxMargin);
  return { ...parsed.data, tiers };
}

/**
 * Validates the environment once at startup.
 * @throws ConfigurationError listing every missing or invalid key
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(
      'Missing or invalid configuration. KICKTIPP_EMAIL, KICKTIPP_PASSWORD and KICKTIPP_NAME_OF_COMPETITION are required',
      issues,
    );
  }
  const env = parsed.data;

  return {
    env,
    credentials: { email: env.KICKTIPP_EMAIL, password: env.KICKTIPP_PASSWORD },
    competition: env.KICKTIPP_NAME_OF_COMPETITION,
    baseUrl: env.KICKTIPP_BASE_URL.replace(/\/+$/, ''),
    leadTimeHours: env.KICKTIPP_HOURS_UNTIL_GAME,
    intervalMinutes: env.KICKTIPP_RUN_EVERY_X_MINUTES,
    overwriteTips: env.OVERWRITE_TIPS,
    browser: { executablePath: env.BROWSER_EXECUTABLE_PATH, timeoutMs: env.SITE_TIMEOUT_MS },
    retry: { maxAttempts: env.SUBMIT_MAX_ATTEMPTS, baseDelayMs: env.SUBMIT_BACKOFF_MS },
    policy: env.PREDICTION_POLICY_FILE
      ? loadPredictionPolicy(env.PREDICTION_POLICY_FILE)
      : DEFAULT_PREDICTION_POLICY,
  };
}
