import { AuthFailureKind } from '../types';

/**
 * Phrases looked for in a login error, checked in order.
 * Matching is best-effort: the platform does not promise stable wording.
 */
const PATTERNS: Array<{ kind: AuthFailureKind; phrases: string[] }> = [
  { kind: 'account-not-found', phrases: ["can't find an account", 'user not found'] },
  { kind: 'bad-credentials', phrases: ['password', 'incorrect', 'wrong'] },
  { kind: 'challenge-required', phrases: ['checkpoint', 'challenge'] },
  { kind: 'rate-limited', phrases: ['rate limit', 'too many'] },
];

export function classifyAuthFailure(message: string): AuthFailureKind {
  const text = message.toLowerCase();

  for (const { kind, phrases } of PATTERNS) {
    if (phrases.some(phrase => text.includes(phrase))) {
      return kind;
    }
  }

  return 'unknown';
}

export interface Remediation {
  headline: string;
  tips: string[];
}

export const REMEDIATION: Record<AuthFailureKind, Remediation> = {
  'account-not-found': {
    headline: '⚠️  ACCOUNT NOT FOUND - the platform cannot find this account',
    tips: [
      'Check USERNAME in your .env file (an email address or a handle both work)',
      'If you use an email, make sure it matches the account exactly',
    ],
  },
  'bad-credentials': {
    headline: '🔒 INCORRECT PASSWORD',
    tips: [
      'Double-check PASSWORD in your .env file',
      'Make sure there are no extra spaces or quotes',
    ],
  },
  'challenge-required': {
    headline: '🛡️  SECURITY CHECK REQUIRED',
    tips: [
      'Check your email/phone for a verification code and run the bot again',
      'You may need to approve the login from the mobile app',
    ],
  },
  'rate-limited': {
    headline: '⏱️  TOO MANY LOGIN ATTEMPTS',
    tips: [
      'Wait 10-15 minutes before trying again',
      'The platform has temporarily blocked login attempts',
    ],
  },
  unknown: {
    headline: '💡 TROUBLESHOOTING TIPS:',
    tips: [
      '1. Check USERNAME in .env (can be email OR username)',
      '2. Check PASSWORD in .env (make sure it is correct)',
      '3. If you have 2FA, the bot will prompt for a verification code',
      '4. You may need to approve the login from the mobile app',
    ],
  },
};
