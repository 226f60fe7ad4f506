import { setTimeout as delay } from 'timers/promises';
import { BotConfig } from '../config';
import { sendCannedReply } from '../delivery/replyDelivery';
import { ThreadNotFoundError } from '../platform/errors';
import { PlatformClient } from '../platform/types';
import { decide } from '../policy/responsePolicy';
import { SessionManager } from '../session/sessionManager';
import { BotState, InboxMessage } from '../types';
import { resolveTargetUserId, resolveThread } from './resolvers';

export type PollerSettings = Pick<
  BotConfig,
  'credentials' | 'targetUsername' | 'responseMessage' | 'checkIntervalSeconds'
>;

export interface PollerDependencies {
  client: PlatformClient;
  sessionManager: Pick<SessionManager, 'establish'>;
  now?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface CycleReport {
  phase: BotState['phase'];
  replies: number;
  markedSeen: number;
}

const abortableSleep = async (ms: number, signal: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

/**
 * Drives the bot: login, target lookup, then the fixed-interval poll of one thread.
 * All mutable state lives in the BotState handed to each call.
 */
export class ConversationPoller {
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(
    private readonly settings: PollerSettings,
    private readonly deps: PollerDependencies
  ) {
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? abortableSleep;
  }

  /**
   * Runs the startup steps. Returns false when the run must stop.
   */
  async start(state: BotState): Promise<boolean> {
    const result = await this.deps.sessionManager.establish(this.settings.credentials);
    if (!result.ok) {
      console.error('❌ Failed to login. Exiting.');
      return false;
    }
    state.selfId = result.session.userId;
    state.phase = 'no-target';

    const targetUserId = await resolveTargetUserId(this.deps.client, this.settings.targetUsername);
    if (!targetUserId) {
      console.error('❌ Failed to get target user ID. Exiting.');
      return false;
    }
    state.targetUserId = targetUserId;
    state.phase = 'no-thread';

    await this.ensureThread(state);
    if (!state.threadId) {
      console.warn('⚠️ No existing conversation found. Will keep looking until they message you.');
    }

    return true;
  }

  /**
   * One poll: resolve the thread if needed, then answer whatever qualifies.
   * Errors are logged and end the cycle early; they never escape.
   */
  async runCycle(state: BotState): Promise<CycleReport> {
    const report: CycleReport = { phase: state.phase, replies: 0, markedSeen: 0 };

    try {
      await this.ensureThread(state);
      if (state.threadId) {
        await this.checkAndRespond(state, state.threadId, report);
      }
    } catch (error) {
      if (error instanceof ThreadNotFoundError) {
        console.warn(`⚠️ ${error.message}, will look for it again`);
        state.threadId = null;
        state.phase = 'no-thread';
      } else {
        console.error('Error checking messages:', error);
      }
    }

    report.phase = state.phase;
    return report;
  }

  /**
   * Poll until the signal fires. The sleep is cut short by an abort; a platform call in flight is not.
   */
  async run(state: BotState, signal: AbortSignal): Promise<void> {
    const intervalMs = this.settings.checkIntervalSeconds * 1000;

    console.log(`🤖 Bot is now running. Monitoring messages from @${this.settings.targetUsername}`);
    console.log(`💬 Will respond with: '${this.settings.responseMessage}'`);
    console.log(`⏱️ Checking every ${this.settings.checkIntervalSeconds} seconds. Press Ctrl+C to stop.`);

    while (!signal.aborted) {
      await this.runCycle(state);
      if (signal.aborted) break;

      try {
        await this.sleep(intervalMs, signal);
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }

    console.log('👋 Bot stopped.');
  }

  private async ensureThread(state: BotState): Promise<void> {
    if (state.threadId || !state.targetUserId) return;

    const threadId = await resolveThread(this.deps.client, state.targetUserId, state.seen);
    if (threadId) {
      state.threadId = threadId;
      state.phase = 'polling';
    }
  }

  private async checkAndRespond(state: BotState, threadId: string, report: CycleReport): Promise<void> {
    const { selfId, targetUserId } = state;
    if (!selfId || !targetUserId) return;

    const thread = await this.deps.client.fetchThread(threadId);
    const now = this.now();

    for (const message of thread.messages) {
      const decision = decide(message, { selfId, targetId: targetUserId, seen: state.seen, now });

      switch (decision.action) {
        case 'ignore':
          break;
        case 'mark-seen':
          if (decision.reason === 'stale') {
            logStaleSkip(decision.ageSeconds);
          }
          state.seen.add(message.id);
          report.markedSeen++;
          break;
        case 'reply':
          await this.reply(state, targetUserId, message);
          report.replies++;
          break;
      }
    }
  }

  private async reply(state: BotState, targetUserId: string, message: InboxMessage): Promise<void> {
    console.log(`📨 New message from ${this.settings.targetUsername}: ${message.text}`);
    await sendCannedReply(this.deps.client, targetUserId, this.settings.responseMessage);
    state.seen.add(message.id);
  }
}

function logStaleSkip(ageSeconds: number | null): void {
  if (ageSeconds === null) {
    console.debug('⏭️ Skipping message with an unreadable timestamp');
  } else {
    console.debug(`⏭️ Skipping old message from ${Math.floor(ageSeconds / 60)} minutes ago`);
  }
}
