// lib/records.ts
import type { Account, VaultRecord } from "@/lib/account";
import { normalizeName } from "@/lib/account";
import { requireCategory } from "@/lib/categories";
import type { SubstitutionCipher } from "@/lib/cipher";
import { alreadyExists, invalidInput, notFound } from "@/lib/errors";

export type DeleteOutcome = "deleted" | "cancelled";

function requireResource(resource: string): string {
  const name = normalizeName(resource);
  if (!name) throw invalidInput("Resource cannot be empty.");
  return name;
}

function requirePassword(password: string): string {
  if (!password) throw invalidInput("Password cannot be empty.");
  return password;
}

function findRecord(account: Account, resource: string): [string, VaultRecord] {
  const name = requireResource(resource);
  const record = account.records.get(name);
  if (!record) throw notFound(`Resource "${name}" not found.`);
  return [name, record];
}

/** Throws unless the resource name is usable for a new record. */
export function assertNewResource(account: Account, resource: string): string {
  const name = requireResource(resource);
  if (account.records.has(name)) throw alreadyExists(`A password for "${name}" already exists.`);
  return name;
}

export function getRecord(account: Account, resource: string): VaultRecord {
  return findRecord(account, resource)[1];
}

export function addRecord(
  account: Account,
  cipher: SubstitutionCipher,
  resource: string,
  plaintextPassword: string,
  category: string,
): void {
  const name = assertNewResource(account, resource);
  const resolved = requireCategory(account, category);
  requirePassword(plaintextPassword);

  account.records.set(name, {
    encryptedPassword: cipher.encrypt(plaintextPassword),
    category: resolved,
  });
}

/** Replaces the password; the record keeps its category. */
export function updateRecord(
  account: Account,
  cipher: SubstitutionCipher,
  resource: string,
  newPlaintextPassword: string,
): void {
  const [name, existing] = findRecord(account, resource);
  requirePassword(newPlaintextPassword);

  account.records.set(name, {
    encryptedPassword: cipher.encrypt(newPlaintextPassword),
    category: existing.category,
  });
}

export function deleteRecord(account: Account, resource: string, confirmed: boolean): DeleteOutcome {
  const [name] = findRecord(account, resource);
  if (!confirmed) return "cancelled";
  account.records.delete(name);
  return "deleted";
}

export function decryptRecord(cipher: SubstitutionCipher, record: VaultRecord): string {
  return cipher.decrypt(record.encryptedPassword);
}
