import { PlatformClient } from '../platform/types';

/**
 * Send the canned reply straight to the target user.
 * Addressed by user ID rather than thread ID, so a stale thread ID cannot misroute it.
 */
export async function sendCannedReply(
  client: PlatformClient,
  targetUserId: string,
  text: string
): Promise<void> {
  try {
    await client.sendDirectMessage(text, [targetUserId]);
    console.log(`✅ Sent response: ${text}`);
  } catch (error) {
    console.error(`Error sending response to ${targetUserId}:`, error);
    throw error;
  }
}
