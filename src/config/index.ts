import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ConfigError } from '../errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Configuration schema
const configSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    nodeEnv: z.enum(['development', 'production', 'test']),
    requestTimeoutMs: z.number().int().positive(),
  }),
  jira: z.object({
    server: z.string().url('JIRA_SERVER must be a URL'),
    user: z.string().min(1, 'JIRA_USER is required'),
    token: z.string().min(1, 'JIRA_TOKEN is required'),
    timeoutMs: z.number().int().positive(),
  }),
  pagination: z
    .object({
      defaultPageSize: z.number().int().min(1),
      maxPageSize: z.number().int().min(1),
    })
    .transform((p) => ({
      defaultPageSize: Math.min(p.defaultPageSize, p.maxPageSize),
      maxPageSize: p.maxPageSize,
    })),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.string().min(1).optional(),
  }),
});

type ParsedConfig = z.infer<typeof configSchema>;

export type ServerConfig = Readonly<ParsedConfig['server']>;
export type JiraConfig = Readonly<ParsedConfig['jira']>;
export type PaginationConfig = Readonly<ParsedConfig['pagination']>;
export type LoggingConfig = Readonly<ParsedConfig['logging']>;

export interface Config {
  readonly server: ServerConfig;
  readonly jira: JiraConfig;
  readonly pagination: PaginationConfig;
  readonly logging: LoggingConfig;
}

/**
 * Load `.env` from the project root into `process.env`.
 * Variables already set in the environment win.
 */
export function loadEnvFile(path: string = join(__dirname, '../../.env')): void {
  dotenv.config({ path });
}

function seconds(value: string | undefined, fallback: number): number {
  return Math.round(parseFloat(value || String(fallback)) * 1000);
}

/**
 * Validate the process environment into an immutable configuration object.
 * Throws a ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    server: {
      host: env.HOST || '0.0.0.0',
      port: parseInt(env.PORT || '8000', 10),
      nodeEnv: env.NODE_ENV || 'development',
      requestTimeoutMs: seconds(env.REQUEST_TIMEOUT, 30),
    },
    jira: {
      server: (env.JIRA_SERVER || '').replace(/\/+$/, ''),
      user: env.JIRA_USER || '',
      token: env.JIRA_TOKEN || '',
      timeoutMs: seconds(env.JIRA_TIMEOUT, 30),
    },
    pagination: {
      defaultPageSize: parseInt(env.DEFAULT_PAGE_SIZE || '20', 10),
      maxPageSize: parseInt(env.JIRA_MAX_RESULTS || '50', 10),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      file: env.LOG_FILE || undefined,
    },
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const { server, jira, pagination, logging } = result.data;
  return Object.freeze({
    server: Object.freeze(server),
    jira: Object.freeze(jira),
    pagination: Object.freeze(pagination),
    logging: Object.freeze(logging),
  });
}
