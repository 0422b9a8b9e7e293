import { AuditRunSummary } from '../types/audit.types';
import { logger } from '../utils/logger';
import { ProgressReporter } from '../utils/console-reporter';
import { AccountDirectoryService } from './account-directory.service';
import { ExportService } from './export.service';
import { LoginActivityService } from './login-activity.service';
import { assembleReport } from './report-assembler.service';

export interface StaleAccountAuditDependencies {
  directory: AccountDirectoryService;
  loginActivity: LoginActivityService;
  exporter: ExportService;
  reporter: ProgressReporter;
  reportFile: string;
  now: () => Date;
}

/**
 * One audit run: directory, login index, classification, report file.
 * Only a failed directory fetch escapes as an error (DirectoryFetchError).
 */
export class StaleAccountAuditService {
  private readonly logger = logger.child({ service: 'StaleAccountAuditService' });

  constructor(private readonly deps: StaleAccountAuditDependencies) {}

  async run(): Promise<AuditRunSummary> {
    const { directory, loginActivity, exporter, reporter } = this.deps;

    const { accounts, droppedCount } = await directory.loadAccounts();
    const { index, stats } = await loginActivity.buildIndex(accounts);

    const report = assembleReport(accounts, index, this.deps.now());
    reporter.success('Processing complete.');

    const reportPath = await exporter.writeReport(report.rows, this.deps.reportFile);
    if (reportPath) {
      reporter.count('Filtered accounts saved to', reportPath);
    } else {
      reporter.error('No accounts found that need to be removed.');
    }

    reporter.count('Total IAM accounts', report.totalAccounts);
    reporter.count('Total accounts scheduled for removal', report.flaggedCount);
    reporter.success('Script execution completed successfully.');

    this.logger.info('Audit run finished', {
      totalAccounts: report.totalAccounts,
      droppedAccounts: droppedCount,
      flagged: report.flaggedCount,
      malformedLogEntries: stats.malformedEntries,
      failedLogFetches: stats.failedFetches
    });

    return {
      totalAccounts: report.totalAccounts,
      droppedAccounts: droppedCount,
      flaggedCount: report.flaggedCount,
      usersWithLogins: index.size,
      loginDataComplete: stats.complete,
      reportPath
    };
  }
}
