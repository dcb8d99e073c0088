// lib/config.ts
import { resolve } from "node:path";
import { z } from "zod";
import { invalidInput } from "@/lib/errors";

export const MAX_LOGIN_ATTEMPTS = 3;
export const MIN_MASTER_SECRET_LENGTH = 6;

export const generatorDefaults = {
  length:     12,
  minLength:  4,
  useDigits:  true,
  useSpecial: true,
} as const;

export interface StorageConfig {
  dataDir:      string;
  alphabetPath: string;
  accountsPath: string;
}

const EnvSchema = z.object({
  KEYSHELF_DATA_DIR:      z.string().min(1).optional(),
  KEYSHELF_ALPHABET_FILE: z.string().min(1).optional(),
  KEYSHELF_ACCOUNTS_FILE: z.string().min(1).optional(),
});

export function getStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const names = parsed.error.issues.map(i => i.path.join(".")).join(", ");
    throw invalidInput(`Invalid storage environment: ${names}`);
  }

  const {
    KEYSHELF_DATA_DIR      = process.cwd(),
    KEYSHELF_ALPHABET_FILE = "charset.txt",
    KEYSHELF_ACCOUNTS_FILE = "users.json",
  } = parsed.data;

  const dataDir = resolve(KEYSHELF_DATA_DIR);
  return {
    dataDir,
    alphabetPath: resolve(dataDir, KEYSHELF_ALPHABET_FILE),
    accountsPath: resolve(dataDir, KEYSHELF_ACCOUNTS_FILE),
  };
}
