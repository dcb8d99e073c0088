// lib/categories.ts
// Built-in categories plus each account's own. Custom categories are
// append-only and must not collide with a built-in or with each other.

import type { Account } from "@/lib/account";
import { normalizeName } from "@/lib/account";
import { alreadyExists, invalidInput } from "@/lib/errors";

const BUILTIN_CATEGORIES: readonly string[] = Object.freeze([
  "Social Networks",
  "Banking/Finance",
  "Work/Business",
  "Email",
  "Education",
  "Entertainment",
  "Shopping",
  "Health/Medicine",
  "Government Services",
  "Other",
]);

export type CategoryChoice =
  | { type: "existing"; name: string }
  | { type: "new"; name: string };

/** A fresh copy on every call. */
export function builtinCategories(): string[] {
  return [...BUILTIN_CATEGORIES];
}

export function availableCategories(account: Account): string[] {
  return [...BUILTIN_CATEGORIES, ...account.customCategories];
}

export function isKnownCategory(account: Account, name: string): boolean {
  return BUILTIN_CATEGORIES.includes(name) || account.customCategories.includes(name);
}

/** Validates and appends a custom category in memory. Returns the stored name. */
export function addCustomCategory(account: Account, name: string): string {
  const category = normalizeName(name);
  if (!category) throw invalidInput("Category name cannot be empty.");
  if (isKnownCategory(account, category)) throw alreadyExists(`Category "${category}" already exists.`);
  account.customCategories.push(category);
  return category;
}

/** Resolves an existing category name, throwing if the account does not know it. */
export function requireCategory(account: Account, name: string): string {
  const category = normalizeName(name);
  if (!category) throw invalidInput("Category cannot be empty.");
  if (!isKnownCategory(account, category)) throw invalidInput(`Unknown category "${category}".`);
  return category;
}
