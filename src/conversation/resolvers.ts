import { SeenMessageSet } from '../buffer/seenSet';
import { PlatformClient } from '../platform/types';

/**
 * How many recent threads are scanned for the target.
 * A linear scan is fine at this size; a target whose thread has dropped
 * out of the most recent 100 will not be found.
 */
export const THREAD_SCAN_LIMIT = 100;

/**
 * Look up the numeric user ID behind a handle. No retry.
 */
export async function resolveTargetUserId(
  client: PlatformClient,
  username: string
): Promise<string | null> {
  try {
    console.log(`🔎 Getting user ID for ${username}...`);
    const userId = await client.lookupUserId(username);
    console.log(`🎯 Target user ID: ${userId}`);
    return userId;
  } catch (error) {
    console.error(`Failed to get user ID for ${username}:`, error);
    return null;
  }
}

/**
 * Find the thread shared with the target and mark its whole history as seen,
 * so a (re)start never answers old messages.
 */
export async function resolveThread(
  client: PlatformClient,
  targetUserId: string,
  seen: SeenMessageSet
): Promise<string | null> {
  try {
    console.log('🧵 Getting thread ID...');
    const threads = await client.listRecentThreads(THREAD_SCAN_LIMIT);
    const match = threads
      .slice(0, THREAD_SCAN_LIMIT)
      .find(thread => thread.participantIds.includes(targetUserId));

    if (!match) {
      console.warn('⚠️ No existing thread found with target user');
      return null;
    }

    console.log(`🧵 Found thread ID: ${match.threadId}`);

    const snapshot = await client.fetchThread(match.threadId);
    seen.addAll(snapshot.messages.map(msg => msg.id));
    console.log(
      `📌 Marked ${snapshot.messages.length} existing messages as processed. Will only respond to NEW messages.`
    );

    return match.threadId;
  } catch (error) {
    console.error('Failed to get thread ID:', error);
    return null;
  }
}
