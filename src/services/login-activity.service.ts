import { AuditConfig } from '../config/audit.config';
import { Account, UNKNOWN_FIELD_VALUE } from '../types/audit.types';
import { logger } from '../utils/logger';
import { ProgressReporter, silentReporter } from '../utils/console-reporter';
import { AUDIT_FILTER_HEADER, buildUserLoginFilter } from '../utils/audit-filter-utils';
import { PageBody, decodeLogEntry } from '../validation/audit-payload.schemas';
import { PaginatedFetcher, PaginationSummary } from './http/paginated-fetcher.service';
import { LastLoginIndex } from './last-login-index';

export interface LoginIndexStats {
  entriesFetched: number;
  loginsRecorded: number;   // events that became a user's latest login
  ignoredEntries: number;   // well-formed, not a sign-in
  malformedEntries: number; // one warning each
  usersQueried: number;
  usersWithoutLogins: number;
  failedFetches: number;
  complete: boolean;
}

export interface LoginActivityResult {
  index: LastLoginIndex;
  stats: LoginIndexStats;
}

type LoginActivityConfig = Pick<AuditConfig, 'logsPath' | 'logPageSize' | 'loginStrategy'>;

/**
 * Builds the last-login index from the audit log, either with one scan of
 * the whole log or with one filtered query per account.
 */
export class LoginActivityService {
  private readonly logger = logger.child({ service: 'LoginActivityService' });

  constructor(
    private readonly fetcher: PaginatedFetcher,
    private readonly config: LoginActivityConfig,
    private readonly reporter: ProgressReporter = silentReporter
  ) {}

  async buildIndex(accounts: Account[]): Promise<LoginActivityResult> {
    const index = new LastLoginIndex();
    const stats: LoginIndexStats = {
      entriesFetched: 0,
      loginsRecorded: 0,
      ignoredEntries: 0,
      malformedEntries: 0,
      usersQueried: 0,
      usersWithoutLogins: 0,
      failedFetches: 0,
      complete: true
    };

    this.reporter.progress('Fetching audit logs...');

    if (this.config.loginStrategy === 'per-user') {
      await this.queryPerUser(accounts, index, stats);
    } else {
      await this.scanAll(index, stats);
    }

    this.reporter.count('Total unique users with login data', index.size);
    return { index, stats };
  }

  private async scanAll(index: LastLoginIndex, stats: LoginIndexStats): Promise<void> {
    const summary = await this.fetcher.forEachPage(
      {
        resource: 'audit logs',
        path: this.config.logsPath,
        params: { top: this.config.logPageSize }
      },
      page => this.applyPage(page, index, stats)
    );
    this.noteIncomplete(summary, stats, 'Error fetching audit logs');
  }

  private async queryPerUser(
    accounts: Account[],
    index: LastLoginIndex,
    stats: LoginIndexStats
  ): Promise<void> {
    const total = accounts.length;

    for (const [position, account] of accounts.entries()) {
      if (account.identity === UNKNOWN_FIELD_VALUE) {
        this.logger.warn(`Cannot query login activity for account ${account.userId}: no email on record`);
      } else {
        stats.usersQueried++;

        const summary = await this.fetcher.forEachPage(
          {
            resource: `login activity for ${account.identity}`,
            path: this.config.logsPath,
            params: {
              top: this.config.logPageSize,
              orderBy: 'loggedDateTime desc',
              labels: 'all'
            },
            headers: { [AUDIT_FILTER_HEADER]: buildUserLoginFilter(account.identity) }
          },
          page => this.applyPage(page, index, stats)
        );

        this.noteIncomplete(summary, stats, `Error fetching audit logs for user ${account.identity}`);

        // The report assembler warns about these accounts
        if (summary.complete && !index.has(account.userId)) {
          stats.usersWithoutLogins++;
        }
      }

      this.reporter.progress(`Processed ${position + 1}/${total} users`);
    }
  }

  private applyPage(page: PageBody, index: LastLoginIndex, stats: LoginIndexStats): void {
    for (const raw of page.items) {
      stats.entriesFetched++;
      const decoded = decodeLogEntry(raw);

      switch (decoded.kind) {
        case 'login':
          if (index.record(decoded.event)) {
            stats.loginsRecorded++;
          }
          break;
        case 'ignored':
          stats.ignoredEntries++;
          break;
        case 'malformed':
          stats.malformedEntries++;
          this.logger.warn(`Skipping audit log entry: ${decoded.reason}`);
          break;
      }
    }
  }

  private noteIncomplete(summary: PaginationSummary, stats: LoginIndexStats, message: string): void {
    if (summary.complete) {
      return;
    }
    stats.complete = false;
    stats.failedFetches++;
    this.logger.error(message, {
      pagesFetched: summary.pageCount,
      code: summary.failure?.code,
      cause: summary.failure?.message
    });
    this.reporter.error(`${message}. Continuing with partial data; check the diagnostic log`);
  }
}
