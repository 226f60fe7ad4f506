import { PlatformClient } from '../platform/types';
import { ChallengeRequiredError, describeError } from '../platform/errors';
import { AuthFailure, Credentials, EstablishResult, PlatformSession } from '../types';
import { ChallengePrompt, PromptCancelledError } from './challengePrompt';
import { SessionStore } from './sessionStore';
import { classifyAuthFailure, REMEDIATION } from './authErrors';

const CHALLENGE_QUESTION = 'Enter the verification code sent to your phone/email: ';

export class SessionManager {
  constructor(
    private readonly client: PlatformClient,
    private readonly store: SessionStore,
    private readonly prompt: ChallengePrompt
  ) {}

  /**
   * Log in, reusing the saved session when it still works.
   * Never throws: failures come back classified, with remediation already logged.
   */
  async establish(credentials: Credentials): Promise<EstablishResult> {
    console.log(`🔑 Logging in to ${this.client.name} as ${credentials.username}...`);

    const restored = await this.tryRestore(credentials);
    if (restored) {
      console.log('✅ Logged in using saved session');
      return { ok: true, session: restored };
    }

    try {
      const session = await this.freshLogin(credentials);
      return { ok: true, session };
    } catch (error) {
      const failure = toAuthFailure(error);
      reportFailure(failure);
      return { ok: false, failure };
    }
  }

  private async tryRestore(credentials: Credentials): Promise<PlatformSession | null> {
    const blob = this.store.load();
    if (blob === null) {
      return null;
    }

    try {
      await this.client.restore(blob);
      const session = await this.client.authenticate(credentials);
      await this.persist();
      return session;
    } catch (error) {
      console.warn(`⚠️ Session login failed: ${describeError(error)}. Trying fresh login...`);
      this.client.clearSession();
      return null;
    }
  }

  private async freshLogin(credentials: Credentials): Promise<PlatformSession> {
    let session: PlatformSession;

    try {
      session = await this.client.authenticate(credentials);
      console.log('✅ Logged in successfully');
    } catch (error) {
      if (!(error instanceof ChallengeRequiredError)) {
        throw error;
      }
      session = await this.completeChallenge(error);
    }

    await this.persist();
    console.log(`💾 Session saved to ${this.store.filePath}`);
    return session;
  }

  private async completeChallenge(challenge: ChallengeRequiredError): Promise<PlatformSession> {
    const label = challenge.challengeType === 'two-factor' ? '2FA' : 'security checkpoint';
    console.warn(`🛡️ ${this.client.name} is asking for verification (${label})`);

    let code: string;
    try {
      code = (await this.prompt(CHALLENGE_QUESTION)).trim();
    } catch (error) {
      if (error instanceof PromptCancelledError) {
        throw new ChallengeRequiredError(error.message, challenge.challengeType, { cause: error });
      }
      throw error;
    }
    if (!code) {
      throw new ChallengeRequiredError('No verification code entered for challenge', challenge.challengeType);
    }

    const session = await this.client.submitChallengeCode(code);
    console.log('✅ Challenge completed successfully!');
    return session;
  }

  private async persist(): Promise<void> {
    this.store.save(await this.client.serializeSession());
  }
}

function toAuthFailure(error: unknown): AuthFailure {
  const message = describeError(error);
  const kind = error instanceof ChallengeRequiredError
    ? 'challenge-required'
    : classifyAuthFailure(message);
  return { kind, message };
}

function reportFailure(failure: AuthFailure): void {
  const { headline, tips } = REMEDIATION[failure.kind];
  console.error(`❌ Login failed: ${failure.message}`);
  console.error('');
  console.error(headline);
  for (const tip of tips) {
    console.error(`   ${tip}`);
  }
}
