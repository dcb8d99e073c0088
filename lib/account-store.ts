// lib/account-store.ts
// All accounts, loaded from and saved to a single JSON document. There is no
// partial persistence: save() rewrites the whole file.
//
// File layout (kept compatible with existing users.json files):
//   { "<login>": { "master_password": "...",
//                  "passwords": { "<resource>": { "encrypted": "...", "category": "..." } },
//                  "custom_categories": ["..."] } }

import { z } from "zod";
import type { Account, VaultRecord } from "@/lib/account";
import { createAccount, normalizeName, validateNewMasterSecret } from "@/lib/account";
import { loadAlphabet, type Alphabet } from "@/lib/alphabet";
import { addCustomCategory } from "@/lib/categories";
import { SubstitutionCipher } from "@/lib/cipher";
import { getStorageConfig, type StorageConfig } from "@/lib/config";
import { alreadyExists, invalidInput, isVaultError, notFound, serializationError, VaultError } from "@/lib/errors";
import { LoginAttempts } from "@/lib/login";
import { compareOrdinal } from "@/lib/queries";
import { VaultSession, type SessionOptions } from "@/lib/session";
import { FileTextStorage, type TextStorage } from "@/lib/text-storage";

// ─── PERSISTED SCHEMA ────────────────────────────────────────────────────────

const RecordSchema = z.object({
  encrypted: z.string(),
  category:  z.string(),
});

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Validated as entries: z.record rebuilds the object and drops a "__proto__" key.
function entriesOf<T extends z.ZodTypeAny>(value: T) {
  return z
    .custom<Record<string, unknown>>(isPlainObject, "Expected an object")
    .transform(obj => Object.entries(obj))
    .pipe(z.array(z.tuple([z.string(), value])));
}

const AccountSchema = z.object({
  master_password:   z.string(),
  passwords:         entriesOf(RecordSchema),
  custom_categories: z.array(z.string()).default([]),
});

const StoreSchema = entriesOf(AccountSchema);

type PersistedRecord = z.infer<typeof RecordSchema>;

interface PersistedAccount {
  master_password:   string;
  passwords:         Record<string, PersistedRecord>;
  custom_categories: string[];
}

function requireTrimmed(value: string, what: string): void {
  if (normalizeName(value) !== value) throw invalidInput(`${what} "${value}" has surrounding whitespace.`);
}

export function parseAccounts(text: string): Map<string, Account> {
  let json: unknown;
  try { json = JSON.parse(text); } catch (err) { throw serializationError("Account store is not valid JSON.", err); }

  const parsed = StoreSchema.safeParse(json);
  if (!parsed.success) throw serializationError("Account store has an unexpected shape.", parsed.error);

  const accounts = new Map<string, Account>();
  for (const [loginName, raw] of parsed.data) {
    try {
      const account = createAccount({
        loginName,
        masterSecret:     raw.master_password,
        records:          raw.passwords.map(([resource, r]): [string, VaultRecord] => [
          resource,
          { encryptedPassword: r.encrypted, category: r.category },
        ]),
        customCategories: raw.custom_categories,
      });
      requireTrimmed(loginName, "Login");
      for (const resource of account.records.keys()) requireTrimmed(resource, "Resource");
      for (const category of account.customCategories) requireTrimmed(category, "Category");
      accounts.set(loginName, account);
    } catch (err) {
      if (isVaultError(err, "InvalidInput")) throw serializationError(err.message, err);
      throw err;
    }
  }
  return accounts;
}

export function serializeAccounts(accounts: Iterable<Account>): string {
  const doc = Object.fromEntries(
    Array.from(accounts, (a): [string, PersistedAccount] => [
      a.loginName,
      {
        master_password:   a.masterSecret,
        passwords:         Object.fromEntries(
          Array.from(a.records, ([resource, r]): [string, PersistedRecord] => [
            resource,
            { encrypted: r.encryptedPassword, category: r.category },
          ]),
        ),
        custom_categories: [...a.customCategories],
      },
    ]),
  );
  return JSON.stringify(doc, null, 2);
}

// ─── STORE ───────────────────────────────────────────────────────────────────

export interface AccountStoreOptions {
  storage?: TextStorage;
  /** Skips reading the alphabet file. */
  alphabet?: Alphabet;
}

export class AccountStore {
  private constructor(
    readonly config: StorageConfig,
    private readonly storage: TextStorage,
    readonly cipher: SubstitutionCipher,
    private readonly accounts: Map<string, Account>,
  ) {}

  static async open(config: StorageConfig = getStorageConfig(), opts: AccountStoreOptions = {}): Promise<AccountStore> {
    const storage  = opts.storage ?? new FileTextStorage();
    const alphabet = opts.alphabet ?? (await loadAlphabet(storage, config.alphabetPath));

    const text = await storage.read(config.accountsPath);
    let accounts = new Map<string, Account>();
    if (text !== null) {
      try {
        accounts = parseAccounts(text);
      } catch (err) {
        console.error("[store/load]", err);
        throw err;
      }
    }
    return new AccountStore(config, storage, new SubstitutionCipher(alphabet), accounts);
  }

  get size(): number {
    return this.accounts.size;
  }

  isEmpty(): boolean {
    return this.accounts.size === 0;
  }

  has(loginName: string): boolean {
    return this.accounts.has(normalizeName(loginName));
  }

  logins(): string[] {
    return [...this.accounts.keys()].sort(compareOrdinal);
  }

  async createAccount(loginName: string, masterSecret: string, confirmSecret: string): Promise<Account> {
    const name = normalizeName(loginName);
    if (!name) throw invalidInput("Login cannot be empty.");
    if (this.accounts.has(name)) throw alreadyExists(`An account named "${name}" already exists.`);
    validateNewMasterSecret(masterSecret, confirmSecret);

    const account = createAccount({ loginName: name, masterSecret });
    this.accounts.set(name, account);
    try {
      await this.save();
    } catch (err) {
      this.accounts.delete(name);
      throw err;
    }
    return account;
  }

  /** Starts a login; the returned tracker enforces the attempt limit. */
  beginLogin(loginName: string): LoginAttempts {
    const name = normalizeName(loginName);
    const account = this.accounts.get(name);
    if (!account) throw notFound(`User "${name}" not found.`);
    return new LoginAttempts(account);
  }

  /** Single-attempt check for callers without a retry loop. */
  authenticate(loginName: string, masterSecret: string): Account {
    const result = this.beginLogin(loginName).attempt(masterSecret);
    if (result.status === "retry") throw new VaultError("AuthenticationFailed", "Wrong master password.");
    return result.account;
  }

  async createCustomCategory(account: Account, name: string): Promise<string> {
    const category = addCustomCategory(this.require(account), name);
    try {
      await this.save();
    } catch (err) {
      account.customCategories.pop();
      throw err;
    }
    return category;
  }

  openSession(account: Account, opts?: SessionOptions): VaultSession {
    return new VaultSession(this, this.require(account), opts);
  }

  async save(): Promise<void> {
    await this.storage.write(this.config.accountsPath, serializeAccounts(this.accounts.values()));
  }

  private require(account: Account): Account {
    if (this.accounts.get(account.loginName) !== account) {
      throw notFound(`Account "${account.loginName}" does not belong to this store.`);
    }
    return account;
  }
}
