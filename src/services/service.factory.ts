import { AxiosInstance } from 'axios';
import { AuditConfig } from '../config/audit.config';
import { ConsoleReporter, ProgressReporter } from '../utils/console-reporter';
import { AccountDirectoryService } from './account-directory.service';
import { StaleAccountAuditService } from './audit-runner.service';
import { ExportService } from './export.service';
import { createApiClient } from './http/api-client';
import { PaginatedFetcher, Sleeper } from './http/paginated-fetcher.service';
import { LoginActivityService } from './login-activity.service';

export interface AuditServiceOverrides {
  client?: AxiosInstance;
  sleeper?: Sleeper;
  reporter?: ProgressReporter;
  now?: () => Date;
}

export interface AuditServices {
  client: AxiosInstance;
  fetcher: PaginatedFetcher;
  directory: AccountDirectoryService;
  loginActivity: LoginActivityService;
  exporter: ExportService;
  runner: StaleAccountAuditService;
}

/**
 * Wire the services for a single run. Nothing here outlives the run.
 */
export function createAuditServices(config: AuditConfig, overrides: AuditServiceOverrides = {}): AuditServices {
  const reporter = overrides.reporter ?? new ConsoleReporter();
  const now = overrides.now ?? (() => new Date());
  const client = overrides.client ?? createApiClient(config);

  const fetcher = new PaginatedFetcher(client, {
    retry: config.retry,
    pageDelayMs: config.pageDelayMs,
    sleeper: overrides.sleeper,
    reporter,
    now
  });

  const directory = new AccountDirectoryService(fetcher, config, reporter);
  const loginActivity = new LoginActivityService(fetcher, config, reporter);
  const exporter = new ExportService();

  const runner = new StaleAccountAuditService({
    directory,
    loginActivity,
    exporter,
    reporter,
    reportFile: config.reportFile,
    now
  });

  return { client, fetcher, directory, loginActivity, exporter, runner };
}
