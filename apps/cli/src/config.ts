import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const DEFAULT_TOGGL_BASE_URL = 'https://api.track.toggl.com';

const aliasMapSchema = z
  .string()
  .default('{}')
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string(), z.string()));

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  TOGGL_API_TOKEN: z.string().trim().min(1, 'is required'),
  TOGGL_WORKSPACE_ID: optionalString.pipe(z.coerce.number().int().positive().optional()),
  TOGGL_BASE_URL: z.string().trim().url().default(DEFAULT_TOGGL_BASE_URL),
  OPENPROJECT_API_KEY: z.string().trim().min(1, 'is required'),
  OPENPROJECT_HOST: z.string().trim().min(1, 'is required'),
  OPENPROJECT_HTTP_SCHEMA: z.enum(['http', 'https']).default('https'),
  OPENPROJECT_DEFAULT_ACTIVITY_ID: optionalString,
  IMPORT_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  IMPORT_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  IMPORT_DURATION_SOURCE: z.enum(['reported', 'timestamps']).default('reported'),
  IMPORT_MIN_DURATION_SECONDS: z.coerce.number().int().min(0).default(60),
  IMPORT_USER_ALIASES: aliasMapSchema,
  IMPORT_PROJECT_ALIASES: aliasMapSchema,
});

export type ImportConfig = z.output<typeof envSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Load `.env`, then `.env.local` on top of it. Variables already set in the
 * process environment win over `.env`, but `.env.local` overrides both.
 */
export function loadEnvFiles(dir: string = process.cwd()): void {
  const envPath = resolve(dir, '.env');
  const envLocalPath = resolve(dir, '.env.local');

  if (existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }

  if (existsSync(envLocalPath)) {
    loadDotenv({ path: envLocalPath, override: true });
  }
}

export function parseConfig(env: NodeJS.ProcessEnv = process.env): ImportConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`));
  }

  return result.data;
}
