// lib/session.ts
// One logged-in account bound to its store. Record edits stay in memory until
// end() (or a category creation) persists the whole store.

import type { Account, VaultRecord } from "@/lib/account";
import type { AccountStore } from "@/lib/account-store";
import { availableCategories, requireCategory, type CategoryChoice } from "@/lib/categories";
import {
  generatePassword,
  normalizeGeneratorOptions,
  type GeneratorOptions,
  type PasswordGenerator,
} from "@/lib/password-generator";
import { listAll, listByCategory, search, type RecordView, type SearchResult } from "@/lib/queries";
import { addRecord, assertNewResource, decryptRecord, deleteRecord, getRecord, updateRecord, type DeleteOutcome } from "@/lib/records";

export interface SessionOptions {
  generator?: PasswordGenerator;
}

export class VaultSession {
  private readonly generator: PasswordGenerator;

  constructor(
    private readonly store: AccountStore,
    readonly account: Account,
    opts: SessionOptions = {},
  ) {
    this.generator = opts.generator ?? generatePassword;
  }

  get loginName(): string {
    return this.account.loginName;
  }

  // ─── CATEGORIES ────────────────────────────────────────────────────────────

  availableCategories(): string[] {
    return availableCategories(this.account);
  }

  createCustomCategory(name: string): Promise<string> {
    return this.store.createCustomCategory(this.account, name);
  }

  async resolveCategory(choice: CategoryChoice): Promise<string> {
    if (choice.type === "new") return this.createCustomCategory(choice.name);
    return requireCategory(this.account, choice.name);
  }

  // ─── RECORDS ───────────────────────────────────────────────────────────────

  /** Empty or missing passwords are generated. Returns the plaintext stored. */
  async addRecord(
    resource: string,
    password: string | undefined,
    category: CategoryChoice,
    generatorOptions?: Partial<GeneratorOptions>,
  ): Promise<string> {
    // Resource checks run before any new category is persisted
    assertNewResource(this.account, resource);
    const resolved = await this.resolveCategory(category);
    const plaintext = password || this.generator(normalizeGeneratorOptions(generatorOptions));
    addRecord(this.account, this.store.cipher, resource, plaintext, resolved);
    return plaintext;
  }

  updateRecord(resource: string, password: string | undefined, generatorOptions?: Partial<GeneratorOptions>): string {
    getRecord(this.account, resource);
    const plaintext = password || this.generator(normalizeGeneratorOptions(generatorOptions));
    updateRecord(this.account, this.store.cipher, resource, plaintext);
    return plaintext;
  }

  deleteRecord(resource: string, confirmed: boolean): DeleteOutcome {
    return deleteRecord(this.account, resource, confirmed);
  }

  getRecord(resource: string): VaultRecord {
    return getRecord(this.account, resource);
  }

  revealPassword(resource: string): string {
    return decryptRecord(this.store.cipher, getRecord(this.account, resource));
  }

  // ─── QUERIES ───────────────────────────────────────────────────────────────

  listByCategory(category: string): RecordView[] {
    return listByCategory(this.account, this.store.cipher, category);
  }

  search(query: string): SearchResult {
    return search(this.account, this.store.cipher, query);
  }

  listAll(): Map<string, RecordView[]> {
    return listAll(this.account, this.store.cipher);
  }

  get recordCount(): number {
    return this.account.records.size;
  }

  // ─── LIFECYCLE ─────────────────────────────────────────────────────────────

  end(): Promise<void> {
    return this.store.save();
  }
}
