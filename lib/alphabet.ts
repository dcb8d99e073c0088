// lib/alphabet.ts
// The ordered character set the substitution cipher works over. Position in
// the sequence is the character's numeric value; characters outside it are
// passed through untouched.

import { serializationError, invalidInput } from "@/lib/errors";
import type { TextStorage } from "@/lib/text-storage";

const DIGITS      = "0123456789";
const LOWERCASE   = "abcdefghijklmnopqrstuvwxyz";
const UPPERCASE   = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const PUNCTUATION = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";

export const DEFAULT_ALPHABET = DIGITS + LOWERCASE + UPPERCASE + PUNCTUATION;

export interface Alphabet {
  readonly chars: string;
  readonly length: number;
  indexOf(char: string): number;
  charAt(index: number): string;
}

/** Builds an immutable alphabet. Repeated characters keep their first position. */
export function createAlphabet(source: string): Alphabet {
  const unique = Array.from(new Set(Array.from(source)));
  if (unique.length === 0) throw invalidInput("Alphabet must contain at least one character.");

  const positions = new Map<string, number>();
  unique.forEach((c, i) => positions.set(c, i));
  const chars = unique.join("");

  return Object.freeze({
    chars,
    length: unique.length,
    indexOf: (char: string) => positions.get(char) ?? -1,
    charAt:  (index: number) => unique[index] ?? "",
  });
}

/**
 * Reads the persisted alphabet, writing the default first if none exists.
 * The stored text is trimmed before use.
 */
export async function loadAlphabet(storage: TextStorage, path: string): Promise<Alphabet> {
  let raw = await storage.read(path);
  if (raw === null) {
    console.info("[alphabet] writing default alphabet to", path);
    await storage.write(path, DEFAULT_ALPHABET);
    raw = await storage.read(path);
    if (raw === null) throw serializationError(`Alphabet at ${path} vanished after write`);
  }

  const trimmed = raw.trim();
  if (!trimmed) throw serializationError(`Alphabet at ${path} is empty`);

  const alphabet = createAlphabet(trimmed);
  if (alphabet.length !== Array.from(trimmed).length) {
    console.warn("[alphabet] duplicate characters dropped from", path);
  }
  return alphabet;
}
