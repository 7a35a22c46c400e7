import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3002),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  ADMIN_EMAIL: z.string().trim().toLowerCase().email('ADMIN_EMAIL must be an email address'),
  BETTER_AUTH_SECRET: z.string().min(16, 'BETTER_AUTH_SECRET must be at least 16 characters'),
  BASE_URL: z.string().url().optional(),
  FRONTEND_URL: z.string().url().optional(),
});

export type NodeEnv = z.infer<typeof envSchema>['NODE_ENV'];

export interface AppConfig {
  port: number;
  nodeEnv: NodeEnv;
  databaseUrl: string;
  /** Sessions whose email matches this address may create, edit and delete posts. */
  adminEmail: string;
  authSecret: string;
  baseUrl: string;
  frontendUrl?: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    databaseUrl: vars.DATABASE_URL,
    adminEmail: vars.ADMIN_EMAIL,
    authSecret: vars.BETTER_AUTH_SECRET,
    baseUrl: vars.BASE_URL ?? `http://localhost:${vars.PORT}`,
    frontendUrl: vars.FRONTEND_URL,
  });
}
