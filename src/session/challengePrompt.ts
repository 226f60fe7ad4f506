import { createInterface } from 'readline/promises';

export type ChallengePrompt = (question: string) => Promise<string>;

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  terminal?: boolean;
}

export class PromptCancelledError extends Error {
  constructor() {
    super('Verification cancelled by operator');
    this.name = 'PromptCancelledError';
  }
}

/**
 * Ask the operator for a one-time verification code.
 * Ctrl+C rejects with PromptCancelledError instead of leaving the question open.
 */
export function createTerminalPrompt(
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): ChallengePrompt {
  return async (question) => {
    const rl = createInterface(streams);
    const controller = new AbortController();
    rl.on('SIGINT', () => controller.abort());

    try {
      const answer = await rl.question(question, { signal: controller.signal });
      return answer.trim();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new PromptCancelledError();
      }
      throw error;
    } finally {
      rl.close();
    }
  };
}

export const promptOnTerminal = createTerminalPrompt();
