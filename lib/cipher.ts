// lib/cipher.ts
// Reversible substitution over an Alphabet. This is obfuscation, not
// encryption: anyone holding the alphabet can reverse it.
//
// Stored passwords are shifted by their own length in characters. The
// transform maps each character to exactly one character, so the ciphertext
// has the same length and the shift can be recovered from it on read.

import type { Alphabet } from "@/lib/alphabet";

/** Length in characters (code points), not UTF-16 units. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}

export function transform(alphabet: Alphabet, text: string, shift: number, decrypt = false): string {
  if (!text) return text;
  const direction = decrypt ? -1 : 1;
  const step = mod(direction * shift, alphabet.length);

  let result = "";
  for (const char of text) {
    const idx = alphabet.indexOf(char);
    result += idx < 0 ? char : alphabet.charAt(mod(idx + step, alphabet.length));
  }
  return result;
}

export class SubstitutionCipher {
  constructor(readonly alphabet: Alphabet) {}

  transform(text: string, shift: number, decrypt = false): string {
    return transform(this.alphabet, text, shift, decrypt);
  }

  encrypt(plaintext: string): string {
    return this.transform(plaintext, charLength(plaintext));
  }

  decrypt(ciphertext: string): string {
    return this.transform(ciphertext, charLength(ciphertext), true);
  }
}
