import { SeenMessageSet } from './buffer/seenSet';

export type RawTimestamp = Date | number | string;

export interface InboxMessage {
  id: string;
  senderId: string;
  text: string;
  timestamp: RawTimestamp;
}

export interface ThreadSummary {
  threadId: string;
  participantIds: string[];
}

export interface ThreadSnapshot {
  threadId: string;
  messages: InboxMessage[];
}

export interface Credentials {
  username: string;
  password: string;
}

export interface PlatformSession {
  userId: string;
}

export type AuthFailureKind =
  | 'account-not-found'
  | 'bad-credentials'
  | 'challenge-required'
  | 'rate-limited'
  | 'unknown';

export interface AuthFailure {
  kind: AuthFailureKind;
  message: string;
}

export type EstablishResult =
  | { ok: true; session: PlatformSession }
  | { ok: false; failure: AuthFailure };

export type Decision =
  | { action: 'ignore'; reason: 'already-seen' | 'not-from-target' }
  | { action: 'mark-seen'; reason: 'own-message' }
  | { action: 'mark-seen'; reason: 'stale'; ageSeconds: number | null }
  | { action: 'reply'; ageSeconds: number };

export type PollerPhase = 'no-session' | 'no-target' | 'no-thread' | 'polling';

export interface BotState {
  phase: PollerPhase;
  selfId: string | null;
  targetUserId: string | null;
  threadId: string | null;
  seen: SeenMessageSet;
}

export function createBotState(): BotState {
  return {
    phase: 'no-session',
    selfId: null,
    targetUserId: null,
    threadId: null,
    seen: new SeenMessageSet(),
  };
}
