import { AuditConfig } from '../config/audit.config';
import { Account } from '../types/audit.types';
import { logger } from '../utils/logger';
import { ProgressReporter, silentReporter } from '../utils/console-reporter';
import { decodeAccount } from '../validation/audit-payload.schemas';
import { DirectoryFetchError } from './base/errors';
import { PaginatedFetcher } from './http/paginated-fetcher.service';

export interface AccountDirectoryResult {
  accounts: Account[];
  droppedCount: number;
}

/**
 * Loads the identity account directory in fetch order
 */
export class AccountDirectoryService {
  private readonly logger = logger.child({ service: 'AccountDirectoryService' });

  constructor(
    private readonly fetcher: PaginatedFetcher,
    private readonly config: Pick<AuditConfig, 'accountsPath' | 'accountPageSize'>,
    private readonly reporter: ProgressReporter = silentReporter
  ) {}

  /**
   * Fetch every account. The directory is all-or-nothing: an incomplete walk
   * raises DirectoryFetchError.
   */
  async loadAccounts(): Promise<AccountDirectoryResult> {
    const accounts: Account[] = [];
    const seen = new Set<string>();
    let droppedCount = 0;

    this.reporter.progress('Fetching IAM accounts...');

    const summary = await this.fetcher.forEachPage(
      {
        resource: 'IAM accounts',
        path: this.config.accountsPath,
        params: { top: this.config.accountPageSize }
      },
      page => {
        for (const item of page.items) {
          const decoded = decodeAccount(item);
          if (decoded.kind === 'malformed') {
            droppedCount++;
            this.logger.warn(`Skipping account: ${decoded.reason}`, { account: item });
            continue;
          }
          if (seen.has(decoded.account.userId)) {
            droppedCount++;
            this.logger.warn(`Skipping duplicate account id: ${decoded.account.userId}`);
            continue;
          }
          seen.add(decoded.account.userId);
          accounts.push(decoded.account);
        }
      }
    );

    if (!summary.complete) {
      this.logger.error('Error fetching IAM accounts', {
        pagesFetched: summary.pageCount,
        cause: summary.failure?.message
      });
      throw new DirectoryFetchError('Error fetching IAM accounts', summary.failure);
    }

    return { accounts, droppedCount };
  }
}
