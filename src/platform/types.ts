import {
  Credentials,
  PlatformSession,
  ThreadSnapshot,
  ThreadSummary,
} from '../types';

/**
 * Everything the bot needs from the messaging platform.
 * The bot never sees the transport behind it.
 */
export interface PlatformClient {
  /**
   * meaningful name for the platform, used in logs
   */
  name: string;

  /**
   * Load a previously serialized session into the client
   */
  restore(blob: string): Promise<void>;

  /**
   * Drop any session state, e.g. after a failed restore
   */
  clearSession(): void;

  serializeSession(): Promise<string>;

  /**
   * Log in with username/password.
   * Throws ChallengeRequiredError when the platform asks for a one-time code.
   */
  authenticate(credentials: Credentials): Promise<PlatformSession>;

  submitChallengeCode(code: string): Promise<PlatformSession>;

  lookupUserId(username: string): Promise<string>;

  listRecentThreads(limit: number): Promise<ThreadSummary[]>;

  /**
   * Throws ThreadNotFoundError when the thread no longer exists
   */
  fetchThread(threadId: string): Promise<ThreadSnapshot>;

  sendDirectMessage(text: string, recipientIds: string[]): Promise<void>;
}
