// lib/password-generator.ts
import { randomBytes } from "node:crypto";
import { generatorDefaults } from "@/lib/config";

const CHARSET = {
  letters: "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ",
  digits:  "0123456789",
  special: "!@#$%^&*",
};

export interface GeneratorOptions {
  length: number;
  useDigits: boolean;
  useSpecial: boolean;
}

export type PasswordGenerator = (opts: GeneratorOptions) => string;

export function generatorCharset(opts: Pick<GeneratorOptions, "useDigits" | "useSpecial">): string {
  let chars = CHARSET.letters;
  if (opts.useDigits)  chars += CHARSET.digits;
  if (opts.useSpecial) chars += CHARSET.special;
  return chars;
}

export const generatePassword: PasswordGenerator = opts => {
  if (opts.length <= 0) return "";
  const chars = generatorCharset(opts);

  // Rejection sampling — bytes at or above maxValid would bias the modulo
  const maxValid = Math.floor(256 / chars.length) * chars.length;
  let result = "";
  while (result.length < opts.length) {
    for (const byte of randomBytes(opts.length * 2)) {
      if (byte < maxValid) result += chars[byte % chars.length];
      if (result.length === opts.length) break;
    }
  }
  return result;
};

/** Fills in defaults. Lengths under the minimum fall back to the default length. */
export function normalizeGeneratorOptions(opts: Partial<GeneratorOptions> = {}): GeneratorOptions {
  const { length = generatorDefaults.length, useDigits = generatorDefaults.useDigits, useSpecial = generatorDefaults.useSpecial } = opts;
  return {
    length: Number.isInteger(length) && length >= generatorDefaults.minLength ? length : generatorDefaults.length,
    useDigits,
    useSpecial,
  };
}
