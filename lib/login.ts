// lib/login.ts
import type { Account } from "@/lib/account";
import { MAX_LOGIN_ATTEMPTS } from "@/lib/config";
import { VaultError } from "@/lib/errors";

export type LoginAttemptResult =
  | { status: "success"; account: Account }
  | { status: "retry"; attemptsLeft: number };

/**
 * Tracks master-password attempts for one login. A wrong secret returns
 * "retry" while attempts remain; the last failure throws AuthenticationFailed.
 */
export class LoginAttempts {
  private failures = 0;

  constructor(
    private readonly account: Account,
    readonly maxAttempts: number = MAX_LOGIN_ATTEMPTS,
  ) {}

  get loginName(): string {
    return this.account.loginName;
  }

  get attemptsLeft(): number {
    return Math.max(0, this.maxAttempts - this.failures);
  }

  attempt(masterSecret: string): LoginAttemptResult {
    if (this.attemptsLeft === 0) throw tooManyAttempts();
    if (masterSecret === this.account.masterSecret) {
      return { status: "success", account: this.account };
    }
    this.failures += 1;
    if (this.attemptsLeft === 0) throw tooManyAttempts();
    return { status: "retry", attemptsLeft: this.attemptsLeft };
  }
}

function tooManyAttempts(): VaultError {
  return new VaultError("AuthenticationFailed", "Too many attempts.");
}

export function attemptsLeftMessage(attemptsLeft: number): string {
  const noun = attemptsLeft === 1 ? "attempt" : "attempts";
  return `Wrong master password. ${attemptsLeft} ${noun} left.`;
}
