import { Decision, InboxMessage, RawTimestamp } from '../types';

/**
 * Messages older than this are never answered, e.g. ones sent before the bot started
 */
export const MAX_REPLY_AGE_SECONDS = 300;

export interface PolicyContext {
  selfId: string;
  targetId: string;
  seen: { has(id: string): boolean };
  now: Date;
}

// ISO date-time without Z or a ±hh:mm offset
const ZONELESS_ISO = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Turn a platform timestamp into an absolute instant.
 * Zoneless ISO strings are read as UTC rather than local time.
 * Returns null when the value cannot be parsed.
 */
export function normalizeTimestamp(value: RawTimestamp): Date | null {
  let date: Date;

  if (value instanceof Date) {
    date = new Date(value.getTime());
  } else if (typeof value === 'number') {
    date = new Date(value);
  } else {
    const text = value.trim();
    date = new Date(ZONELESS_ISO.test(text) ? `${text.replace(' ', 'T')}Z` : text);
  }

  return Number.isNaN(date.getTime()) ? null : date;
}

export function messageAgeSeconds(message: InboxMessage, now: Date): number | null {
  const sentAt = normalizeTimestamp(message.timestamp);
  if (!sentAt) return null;
  return (now.getTime() - sentAt.getTime()) / 1000;
}

/**
 * Decide what to do with one fetched message. First matching rule wins.
 * Pure: marking seen and sending are left to the caller.
 */
export function decide(message: InboxMessage, context: PolicyContext): Decision {
  if (context.seen.has(message.id)) {
    return { action: 'ignore', reason: 'already-seen' };
  }

  if (message.senderId === context.selfId) {
    return { action: 'mark-seen', reason: 'own-message' };
  }

  // Third-party messages stay unmarked and get re-checked next poll
  if (message.senderId !== context.targetId) {
    return { action: 'ignore', reason: 'not-from-target' };
  }

  const ageSeconds = messageAgeSeconds(message, context.now);
  if (ageSeconds === null || ageSeconds > MAX_REPLY_AGE_SECONDS) {
    return { action: 'mark-seen', reason: 'stale', ageSeconds };
  }

  return { action: 'reply', ageSeconds };
}
