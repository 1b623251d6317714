import { z } from 'zod';
import { zodIssues } from './errors';

const DEFAULT_CORS_ORIGINS = 'http://localhost:5173,https://localhost:3000';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGINS),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_SECURE: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
  EMAIL_FROM: z.string().optional(),
  DASHBOARD_URL: z.string().url().default('http://localhost:5173'),
});

export interface EmailConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  from: string;
}

export interface AppConfig {
  databaseUrl: string;
  jwtSecret: string;
  port: number;
  corsOrigins: string[];
  /** null when SMTP is not fully configured; email is then skipped */
  email: EmailConfig | null;
  dashboardUrl: string;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  ${problems.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/** Empty strings count as unset. */
function compact(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(compact(env));
  if (!parsed.success) throw new ConfigError(zodIssues(parsed.error));
  const e = parsed.data;

  const email =
    e.SMTP_HOST && e.SMTP_USER && e.SMTP_PASS
      ? {
          host: e.SMTP_HOST,
          port: e.SMTP_PORT,
          secure: e.SMTP_SECURE,
          user: e.SMTP_USER,
          pass: e.SMTP_PASS,
          from: e.EMAIL_FROM ?? e.SMTP_USER,
        }
      : null;

  return {
    databaseUrl: e.DATABASE_URL,
    jwtSecret: e.JWT_SECRET,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    email,
    dashboardUrl: e.DASHBOARD_URL.replace(/\/+$/, ''),
  };
}
