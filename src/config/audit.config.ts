import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../services/base/errors';
import { LoginStrategy } from '../types/audit.types';

export const INACTIVITY_WINDOW_DAYS = 90;

export const DEFAULT_API_BASE_URL = 'https://api.xdr.trendmicro.com';
export const DEFAULT_ACCOUNTS_PATH = '/v3.0/iam/accounts';
export const DEFAULT_LOGS_PATH = '/v3.0/audit/logs';
export const DEFAULT_REPORT_FILE = 'filtered_accounts_report.csv';
export const DEFAULT_DIAGNOSTIC_LOG = 'error.log';

export interface RetryPolicy {
  maxAttempts: number;
  transientBaseSeconds: number;   // wait = base^n + offset
  transientOffsetSeconds: number;
  rateLimitDefaultSeconds: number; // used when Retry-After is absent
}

export interface AuditConfig {
  token: string;
  apiBaseUrl: string;
  accountsPath: string;
  logsPath: string;
  loginStrategy: LoginStrategy;
  accountPageSize: number;
  logPageSize: number;
  pageDelayMs: number;
  requestTimeoutMs: number;
  reportFile: string;      // absolute
  diagnosticLog: string;   // absolute
  logLevel: string;
  retry: RetryPolicy;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  transientBaseSeconds: 2,
  transientOffsetSeconds: 1,
  rateLimitDefaultSeconds: 10
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  AUDIT_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  AUDIT_ACCOUNTS_PATH: z.string().startsWith('/').default(DEFAULT_ACCOUNTS_PATH),
  AUDIT_LOGS_PATH: z.string().startsWith('/').default(DEFAULT_LOGS_PATH),
  AUDIT_LOGIN_STRATEGY: z.enum(['scan', 'per-user']).default('scan'),
  AUDIT_ACCOUNT_PAGE_SIZE: positiveInt.default(50),
  AUDIT_LOG_PAGE_SIZE: positiveInt.optional(),
  AUDIT_PAGE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  AUDIT_REQUEST_TIMEOUT_MS: positiveInt.default(30000),
  AUDIT_REPORT_FILE: z.string().min(1).default(DEFAULT_REPORT_FILE),
  AUDIT_DIAGNOSTIC_LOG: z.string().min(1).default(DEFAULT_DIAGNOSTIC_LOG),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn')
});

export interface LoadConfigOptions {
  token: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Build the run configuration from the CLI token and the environment.
 * Empty environment values are treated as unset.
 */
export function loadAuditConfig(options: LoadConfigOptions): AuditConfig {
  const token = options.token.trim();
  if (!token) {
    throw new ConfigurationError('An API token is required', 'token');
  }

  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || undefined;
    throw new ConfigurationError(
      `Invalid configuration${field ? ` for ${field}` : ''}: ${issue?.message ?? 'unknown error'}`,
      field,
      parsed.error
    );
  }

  const values = parsed.data;
  const loginStrategy: LoginStrategy = values.AUDIT_LOGIN_STRATEGY;

  return {
    token,
    apiBaseUrl: values.AUDIT_API_BASE_URL.replace(/\/+$/, ''),
    accountsPath: values.AUDIT_ACCOUNTS_PATH,
    logsPath: values.AUDIT_LOGS_PATH,
    loginStrategy,
    accountPageSize: values.AUDIT_ACCOUNT_PAGE_SIZE,
    logPageSize: values.AUDIT_LOG_PAGE_SIZE ?? (loginStrategy === 'per-user' ? 100 : 50),
    pageDelayMs: values.AUDIT_PAGE_DELAY_MS,
    requestTimeoutMs: values.AUDIT_REQUEST_TIMEOUT_MS,
    reportFile: path.resolve(cwd, values.AUDIT_REPORT_FILE),
    diagnosticLog: path.resolve(cwd, values.AUDIT_DIAGNOSTIC_LOG),
    logLevel: values.LOG_LEVEL,
    retry: { ...DEFAULT_RETRY_POLICY }
  };
}
