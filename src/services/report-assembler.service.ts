import { Account, AuditReport, ClassificationRecord } from '../types/audit.types';
import { logger } from '../utils/logger';
import { LastLoginIndex } from './last-login-index';
import { isRecent, parseLoginTimestamp } from './staleness';

const reportLogger = logger.child({ service: 'ReportAssembler' });

export function classifyAccount(account: Account, index: LastLoginIndex, now: Date): ClassificationRecord {
  const base = {
    userId: account.userId,
    identity: account.identity,
    roleName: account.roleName
  };

  const lastLogin = index.get(account.userId);
  if (lastLogin === undefined) {
    return { ...base, disposition: 'Remove', reason: 'never-logged-in' };
  }

  if (isRecent(lastLogin, now)) {
    return { ...base, disposition: 'Keep', reason: 'recent', lastLogin };
  }

  return {
    ...base,
    disposition: 'Remove',
    reason: parseLoginTimestamp(lastLogin) ? 'inactive' : 'unparseable-timestamp',
    lastLogin
  };
}

/**
 * Join the directory with the login index. Only removal candidates become
 * rows; they keep directory order.
 */
export function assembleReport(accounts: Account[], index: LastLoginIndex, now: Date): AuditReport {
  const rows: ClassificationRecord[] = [];

  for (const account of accounts) {
    const record = classifyAccount(account, index, now);
    if (record.disposition !== 'Remove') {
      continue;
    }
    if (record.reason === 'never-logged-in') {
      reportLogger.warn(`No login activity found for user: ${account.identity}`);
    }
    rows.push(record);
  }

  return {
    rows,
    totalAccounts: accounts.length,
    flaggedCount: rows.length
  };
}
