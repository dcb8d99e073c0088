// lib/queries.ts
// Read-only views over an account's records, decrypted and ordered by
// resource name (ordinal comparison, not locale-aware).

import type { Account } from "@/lib/account";
import { normalizeName } from "@/lib/account";
import type { SubstitutionCipher } from "@/lib/cipher";

export interface RecordView {
  resource: string;
  password: string;
}

export interface SearchMatch extends RecordView {
  category: string;
}

export type SearchResult =
  | { status: "invalid-query" }
  | { status: "ok"; matches: SearchMatch[] };

/** Orders by Unicode code point, so astral characters sort after U+E000–U+FFFF. */
export function compareOrdinal(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(i) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
    i += x > 0xffff ? 2 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

function decryptedEntries(account: Account, cipher: SubstitutionCipher): SearchMatch[] {
  return Array.from(account.records, ([resource, record]) => ({
    resource,
    password: cipher.decrypt(record.encryptedPassword),
    category: record.category,
  })).sort((a, b) => compareOrdinal(a.resource, b.resource));
}

export function listByCategory(account: Account, cipher: SubstitutionCipher, category: string): RecordView[] {
  return decryptedEntries(account, cipher)
    .filter(e => e.category === category)
    .map(({ resource, password }) => ({ resource, password }));
}

/** Case-insensitive substring match on resource names. An empty query is rejected, not an error. */
export function search(account: Account, cipher: SubstitutionCipher, query: string): SearchResult {
  const needle = normalizeName(query).toLowerCase();
  if (!needle) return { status: "invalid-query" };

  const matches = decryptedEntries(account, cipher).filter(e => e.resource.toLowerCase().includes(needle));
  return { status: "ok", matches };
}

/** Every record grouped by category; categories and resources both ascending. */
export function listAll(account: Account, cipher: SubstitutionCipher): Map<string, RecordView[]> {
  const groups = new Map<string, RecordView[]>();
  for (const { resource, password, category } of decryptedEntries(account, cipher)) {
    const items = groups.get(category) ?? [];
    items.push({ resource, password });
    groups.set(category, items);
  }
  return new Map([...groups].sort(([a], [b]) => compareOrdinal(a, b)));
}
