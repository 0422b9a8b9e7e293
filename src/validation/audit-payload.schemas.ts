import { z } from 'zod';
import {
  Account,
  LoginEvent,
  LOG_ON_ACTIVITY,
  UNKNOWN_FIELD_VALUE
} from '../types/audit.types';

/**
 * Decoders for raw API payloads. Everything from the network is `unknown`
 * until it has passed through one of these.
 */

// ==================== Page bodies ====================

export const pageBodySchema = z.object({
  items: z.array(z.unknown()).default([]),
  nextLink: z.string().optional().nullable(),
  '@odata.nextLink': z.string().optional().nullable()
}).passthrough();

export type PageBody = z.infer<typeof pageBodySchema>;

/**
 * Server-supplied link to the next page, checking both field names
 */
export function getNextLink(page: PageBody): string | undefined {
  const link = page.nextLink || page['@odata.nextLink'];
  return link ? link : undefined;
}

// ==================== Decode results ====================

export interface Malformed {
  kind: 'malformed';
  reason: string;
}

export type AccountDecodeResult =
  | { kind: 'account'; account: Account }
  | Malformed;

export type LogEntryDecodeResult =
  | { kind: 'login'; event: LoginEvent }
  | { kind: 'ignored'; activity: string | null }
  | Malformed;

const nonEmptyString = z.string().trim().min(1);
// Timestamps stay verbatim; the classifier judges their format
const rawTimestamp = z.string().min(1);
const recordSchema = z.record(z.unknown());

function optionalText(value: unknown): string | undefined {
  const parsed = nonEmptyString.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (Array.isArray(value)) {
    return undefined;
  }
  const parsed = recordSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// ==================== Accounts ====================

export function decodeAccount(raw: unknown): AccountDecodeResult {
  const item = asRecord(raw);
  if (!item) {
    return { kind: 'malformed', reason: `account entry is ${describe(raw)}, expected object` };
  }

  const userId = optionalText(item.id);
  if (!userId) {
    return { kind: 'malformed', reason: 'account entry has no id' };
  }

  return {
    kind: 'account',
    account: {
      userId,
      identity: optionalText(item.email) ?? UNKNOWN_FIELD_VALUE,
      roleName: optionalText(item.role) ?? UNKNOWN_FIELD_VALUE
    }
  };
}

// ==================== Audit log entries ====================

/**
 * Identity check runs before the activity check, so an entry with a broken
 * identifier is malformed whatever its activity.
 */
export function decodeLogEntry(raw: unknown): LogEntryDecodeResult {
  const entry = asRecord(raw);
  if (!entry) {
    return { kind: 'malformed', reason: `log entry is ${describe(raw)}, expected object` };
  }

  const details = entry.details === undefined ? {} : asRecord(entry.details);
  if (!details) {
    return { kind: 'malformed', reason: `'details' is ${describe(entry.details)}, expected object` };
  }

  const identifier = details.identifier;
  if (typeof identifier === 'string') {
    return { kind: 'malformed', reason: `unexpected string in 'identifier': ${identifier}` };
  }
  const identity = asRecord(identifier);
  if (!identity) {
    return { kind: 'malformed', reason: `'identifier' is ${describe(identifier)}, expected object` };
  }

  const activity = typeof entry.activity === 'string' ? entry.activity : null;
  if (activity !== LOG_ON_ACTIVITY) {
    return { kind: 'ignored', activity };
  }

  const userId = optionalText(identity.id);
  if (!userId) {
    return { kind: 'malformed', reason: "'Log on' entry has no identifier id" };
  }

  const loggedAt = rawTimestamp.safeParse(entry.loggedDateTime);
  if (!loggedAt.success) {
    return { kind: 'malformed', reason: `'Log on' entry for ${userId} has no loggedDateTime` };
  }

  return {
    kind: 'login',
    event: { userId, activity: LOG_ON_ACTIVITY, loggedAt: loggedAt.data }
  };
}
