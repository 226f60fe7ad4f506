import {
  IgApiClient,
  IgCheckpointError,
  IgLoginTwoFactorRequiredError,
  IgNotFoundError,
} from 'instagram-private-api';
import { Credentials, InboxMessage, PlatformSession, ThreadSnapshot, ThreadSummary } from '../types';
import { PlatformClient } from './types';
import { ChallengeRequiredError, PlatformError, ThreadNotFoundError, UserNotFoundError } from './errors';

type PendingChallenge =
  | { type: 'two-factor'; username: string; twoFactorIdentifier: string }
  | { type: 'checkpoint' };

function readTwoFactorIdentifier(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('two_factor_info' in body)) return null;
  const info: unknown = body.two_factor_info;
  if (typeof info !== 'object' || info === null || !('two_factor_identifier' in info)) return null;
  const identifier: unknown = info.two_factor_identifier;
  return typeof identifier === 'string' ? identifier : null;
}

/**
 * Instagram direct messages through the private mobile API
 */
export class InstagramClient implements PlatformClient {
  name = 'Instagram';
  private ig: IgApiClient;
  private restored = false;
  private pendingChallenge: PendingChallenge | null = null;

  constructor() {
    this.ig = new IgApiClient();
  }

  async restore(blob: string): Promise<void> {
    await this.ig.state.deserialize(blob);
    this.restored = true;
  }

  clearSession(): void {
    this.ig = new IgApiClient();
    this.restored = false;
    this.pendingChallenge = null;
  }

  async serializeSession(): Promise<string> {
    // constants are rebuilt by the library on load
    const { constants, ...state } = await this.ig.state.serialize();
    return JSON.stringify(state);
  }

  async authenticate(credentials: Credentials): Promise<PlatformSession> {
    if (!this.restored) {
      this.ig.state.generateDevice(credentials.username);
    }

    try {
      const user = await this.ig.account.login(credentials.username, credentials.password);
      return { userId: String(user.pk) };
    } catch (error) {
      if (error instanceof IgLoginTwoFactorRequiredError) {
        const twoFactorIdentifier = readTwoFactorIdentifier(error.response.body);
        if (!twoFactorIdentifier) {
          throw new PlatformError('Two-factor login required but no identifier was returned', { cause: error });
        }
        this.pendingChallenge = { type: 'two-factor', username: credentials.username, twoFactorIdentifier };
        throw new ChallengeRequiredError('Two-factor challenge required', 'two-factor', { cause: error });
      }

      if (error instanceof IgCheckpointError) {
        await this.ig.challenge.auto(true);
        this.pendingChallenge = { type: 'checkpoint' };
        throw new ChallengeRequiredError('Checkpoint challenge required', 'checkpoint', { cause: error });
      }

      throw error;
    }
  }

  async submitChallengeCode(code: string): Promise<PlatformSession> {
    const pending = this.pendingChallenge;
    if (!pending) {
      throw new PlatformError('No challenge is pending');
    }

    if (pending.type === 'two-factor') {
      await this.ig.account.twoFactorLogin({
        username: pending.username,
        verificationCode: code,
        twoFactorIdentifier: pending.twoFactorIdentifier,
        verificationMethod: '1',
        trustThisDevice: '1',
      });
    } else {
      await this.ig.challenge.sendSecurityCode(code);
    }

    this.pendingChallenge = null;
    const user = await this.ig.account.currentUser();
    return { userId: String(user.pk) };
  }

  async lookupUserId(username: string): Promise<string> {
    try {
      const id = await this.ig.user.getIdByUsername(username);
      return String(id);
    } catch (error) {
      throw new UserNotFoundError(username, { cause: error });
    }
  }

  async listRecentThreads(limit: number): Promise<ThreadSummary[]> {
    const feed = this.ig.feed.directInbox();
    const threads: ThreadSummary[] = [];

    do {
      const page = await feed.items();
      for (const thread of page) {
        threads.push({
          threadId: thread.thread_id,
          participantIds: thread.users.map(user => String(user.pk)),
        });
      }
    } while (threads.length < limit && feed.isMoreAvailable());

    return threads.slice(0, limit);
  }

  async fetchThread(threadId: string): Promise<ThreadSnapshot> {
    try {
      const feed = this.ig.feed.directThread({ thread_id: threadId, oldest_cursor: '' });
      const items = await feed.items();
      const messages: InboxMessage[] = items.map(item => ({
        id: item.item_id,
        senderId: String(item.user_id),
        text: item.text ?? '',
        // microseconds since the epoch
        timestamp: Math.floor(Number(item.timestamp) / 1000),
      }));
      return { threadId, messages };
    } catch (error) {
      if (error instanceof IgNotFoundError) {
        throw new ThreadNotFoundError(threadId, { cause: error });
      }
      throw error;
    }
  }

  async sendDirectMessage(text: string, recipientIds: string[]): Promise<void> {
    await this.ig.entity.directThread(recipientIds).broadcastText(text);
  }
}
