// lib/account.ts
import { MIN_MASTER_SECRET_LENGTH } from "@/lib/config";
import { invalidInput } from "@/lib/errors";

export interface VaultRecord {
  encryptedPassword: string;
  category: string;
}

export interface Account {
  readonly loginName: string;
  // Compared verbatim at login; not hashed.
  readonly masterSecret: string;
  readonly records: Map<string, VaultRecord>;
  readonly customCategories: string[];
}

export function normalizeName(value: string): string {
  return value.trim();
}

export function createAccount(init: {
  loginName: string;
  masterSecret: string;
  records?: Iterable<[string, VaultRecord]>;
  customCategories?: string[];
}): Account {
  const loginName = normalizeName(init.loginName);
  if (!loginName) throw invalidInput("Login cannot be empty.");
  if (!init.masterSecret) throw invalidInput("Master password cannot be empty.");

  const records = new Map<string, VaultRecord>();
  for (const [resource, record] of init.records ?? []) {
    if (!resource) throw invalidInput(`Account "${loginName}" has a record with an empty resource name.`);
    records.set(resource, { ...record });
  }

  return {
    loginName,
    masterSecret: init.masterSecret,
    records,
    customCategories: [...(init.customCategories ?? [])],
  };
}

/** Checks a new master secret against its confirmation. */
export function validateNewMasterSecret(masterSecret: string, confirmSecret: string): void {
  if (Array.from(masterSecret).length < MIN_MASTER_SECRET_LENGTH) {
    throw invalidInput(`Master password must be at least ${MIN_MASTER_SECRET_LENGTH} characters.`);
  }
  if (masterSecret !== confirmSecret) throw invalidInput("Passwords do not match.");
}
