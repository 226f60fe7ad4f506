export class PlatformError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ChallengeRequiredError extends PlatformError {
  constructor(
    message: string,
    readonly challengeType: 'two-factor' | 'checkpoint',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ThreadNotFoundError extends PlatformError {
  constructor(readonly threadId: string, options?: { cause?: unknown }) {
    super(`Thread ${threadId} not found`, options);
  }
}

export class UserNotFoundError extends PlatformError {
  constructor(readonly username: string, options?: { cause?: unknown }) {
    super(`User not found: ${username}`, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
