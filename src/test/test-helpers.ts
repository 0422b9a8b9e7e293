import axios, { AxiosInstance } from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { AuditConfig, DEFAULT_RETRY_POLICY } from '@/config/audit.config';
import { PaginatedFetcher, Sleeper } from '@/services/http/paginated-fetcher.service';
import { ProgressReporter } from '@/utils/console-reporter';

export const TEST_BASE_URL = 'https://api.test';
export const ACCOUNTS_PATH = '/v3.0/iam/accounts';
export const LOGS_PATH = '/v3.0/audit/logs';

/**
 * Sleeper that records requested delays and returns immediately
 */
export function createRecordingSleeper(): { sleeper: Sleeper; delays: number[] } {
  const delays: number[] = [];
  const sleeper: Sleeper = async ms => {
    delays.push(ms);
  };
  return { sleeper, delays };
}

export type RecordingReporter = jest.Mocked<ProgressReporter>;

export function createRecordingReporter(): RecordingReporter {
  return {
    progress: jest.fn(),
    count: jest.fn(),
    success: jest.fn(),
    error: jest.fn()
  };
}

export function buildTestConfig(overrides: Partial<AuditConfig> = {}): AuditConfig {
  return {
    token: 'test-token',
    apiBaseUrl: TEST_BASE_URL,
    accountsPath: ACCOUNTS_PATH,
    logsPath: LOGS_PATH,
    loginStrategy: 'scan',
    accountPageSize: 50,
    logPageSize: 50,
    pageDelayMs: 500,
    requestTimeoutMs: 30000,
    reportFile: '/tmp/stale-account-audit-test/filtered_accounts_report.csv',
    diagnosticLog: '/tmp/stale-account-audit-test/error.log',
    logLevel: 'warn',
    retry: { ...DEFAULT_RETRY_POLICY },
    ...overrides
  };
}

export interface MockedApi {
  client: AxiosInstance;
  mock: MockAdapter;
}

export function createMockedApi(): MockedApi {
  const client = axios.create({ baseURL: TEST_BASE_URL });
  return { client, mock: new MockAdapter(client) };
}

export function createTestFetcher(
  client: AxiosInstance,
  sleeper: Sleeper,
  reporter?: ProgressReporter,
  pageDelayMs: number = 500
): PaginatedFetcher {
  return new PaginatedFetcher(client, {
    retry: { ...DEFAULT_RETRY_POLICY },
    pageDelayMs,
    sleeper,
    reporter,
    now: () => new Date('2024-06-01T00:00:00Z')
  });
}

// ==================== Payload fixtures ====================

export function rawAccount(id: string, email?: string, role?: string): Record<string, unknown> {
  const account: Record<string, unknown> = { id, status: 'enabled' };
  if (email !== undefined) account.email = email;
  if (role !== undefined) account.role = role;
  return account;
}

export function logOnEntry(userId: string, loggedDateTime: string): Record<string, unknown> {
  return {
    loggedDateTime,
    activity: 'Log on',
    category: 'Logon and Logoff',
    details: {
      identifier: { id: userId, type: 'account' }
    }
  };
}

export function nextLinkFor(path: string, token: string): string {
  return `${TEST_BASE_URL}${path}?skipToken=${token}`;
}
