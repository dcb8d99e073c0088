// lib/errors.ts
// Failure taxonomy shared by every vault operation.
//
// Validation and lookup failures are thrown as VaultError and are recoverable:
// the caller decides whether to prompt again or give up. Expected outcomes
// (a cancelled delete, an empty search query, a wrong master password with
// attempts remaining) are returned as values instead.

export type VaultErrorKind =
  | "InvalidInput"
  | "NotFound"
  | "AlreadyExists"
  | "AuthenticationFailed"
  | "SerializationError";

export class VaultError extends Error {
  readonly kind: VaultErrorKind;

  constructor(kind: VaultErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
    this.kind = kind;
  }
}

export function isVaultError(value: unknown, kind?: VaultErrorKind): value is VaultError {
  if (!(value instanceof VaultError)) return false;
  return kind === undefined || value.kind === kind;
}

// ─── SHORTHANDS ──────────────────────────────────────────────────────────────

export const invalidInput  = (message: string) => new VaultError("InvalidInput", message);
export const notFound      = (message: string) => new VaultError("NotFound", message);
export const alreadyExists = (message: string) => new VaultError("AlreadyExists", message);

export function serializationError(message: string, cause?: unknown): VaultError {
  return new VaultError("SerializationError", message, { cause });
}
