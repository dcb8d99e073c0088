// lib/text-storage.ts
// Whole-document text persistence with two backends:
//
//   FileTextStorage   — files on local disk; every write replaces the file
//                       through a temporary sibling + rename
//   MemoryTextStorage — an in-process Map, for tests and embedding
//
// Both report an absent document as null. Anything else that stops a read
// (permissions, a directory in the way) is a SerializationError.

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { serializationError } from "@/lib/errors";

export interface TextStorage {
  read(path: string): Promise<string | null>;
  write(path: string, text: string): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ─── DISK ────────────────────────────────────────────────────────────────────

export class FileTextStorage implements TextStorage {
  async read(path: string): Promise<string | null> {
    try {
      return await readFile(path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw serializationError(`Cannot read ${path}`, err);
    }
  }

  async write(path: string, text: string): Promise<void> {
    const tmp = `${path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmp, text, "utf-8");
      await rename(tmp, path);
    } catch (err) {
      console.error("[storage/write]", err);
      await rm(tmp, { force: true });
      throw serializationError(`Cannot write ${path}`, err);
    }
  }
}

// ─── MEMORY ──────────────────────────────────────────────────────────────────

export class MemoryTextStorage implements TextStorage {
  readonly files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(initial)) this.files.set(path, text);
  }

  async read(path: string): Promise<string | null> {
    return this.files.get(path) ?? null;
  }

  async write(path: string, text: string): Promise<void> {
    this.files.set(path, text);
  }
}
