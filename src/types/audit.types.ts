/**
 * Audit Domain Types
 * Shapes shared by the directory loader, the login index builder and the report
 */

// ==================== Directory ====================

export const UNKNOWN_FIELD_VALUE = 'Unknown';

export interface Account {
  userId: string;
  identity: string; // email, or UNKNOWN_FIELD_VALUE
  roleName: string; // or UNKNOWN_FIELD_VALUE
}

// ==================== Audit log ====================

export const LOG_ON_ACTIVITY = 'Log on';

export interface LoginEvent {
  userId: string;
  activity: typeof LOG_ON_ACTIVITY;
  loggedAt: string; // raw timestamp, expected as YYYY-MM-DDTHH:MM:SSZ
}

export type LoginStrategy = 'scan' | 'per-user';

// ==================== Report ====================

export type Disposition = 'Keep' | 'Remove';

export type ClassificationReason =
  | 'recent'
  | 'inactive'
  | 'never-logged-in'
  | 'unparseable-timestamp';

export interface ClassificationRecord {
  userId: string;
  identity: string;
  roleName: string;
  disposition: Disposition;
  reason: ClassificationReason;
  lastLogin?: string;
}

export interface AuditReport {
  rows: ClassificationRecord[];
  totalAccounts: number;
  flaggedCount: number;
}

export interface AuditRunSummary {
  totalAccounts: number;
  droppedAccounts: number;
  flaggedCount: number;
  usersWithLogins: number;
  loginDataComplete: boolean;
  reportPath: string | null;
}
