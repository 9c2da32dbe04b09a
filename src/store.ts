import { readFile, writeFile } from "node:fs/promises";
import { StoreFormatError, StoreIoError } from "./errors";
import type { PatientsDocument, StoredPatient } from "./types";

/**
 * Whole-collection persistence for patients.
 *
 * Every call reads or writes the complete document; there are no partial
 * writes and no locking. Callers serialize load-modify-save themselves.
 */
export interface RecordStore {
  load(): Promise<PatientsDocument>;
  save(doc: PatientsDocument): Promise<void>;
}

export type FileSystemLike = {
  readFile: (path: string, encoding: "utf8") => Promise<string>;
  writeFile: (path: string, data: string, encoding: "utf8") => Promise<void>;
};

type FileRecordStoreOptions = {
  maxRetries?: number;
  minDelayMs?: number;
  fs?: FileSystemLike;
  sleepImpl?: (ms: number) => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function jitter(ms: number): number {
  const rand = Math.random() * 0.3 + 0.85; // 0.85..1.15
  return Math.round(ms * rand);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Sets an own, enumerable key on a record. Plain assignment to `__proto__`
 * would replace the prototype instead of adding an entry.
 */
export function putEntry<T>(
  target: Record<string, T>,
  key: string,
  value: T
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Checks that parsed JSON is a mapping of id -> object.
 *
 * Individual records are not validated here: a hand-edited entry with a bad
 * field still loads and is rejected only when someone tries to rewrite it.
 */
export function parsePatientsDocument(
  text: string,
  path: string
): PatientsDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StoreFormatError(path, `not valid JSON (${reason})`);
  }

  if (!isPlainObject(parsed)) {
    throw new StoreFormatError(path, "top-level value must be an object");
  }

  const doc: PatientsDocument = {};
  for (const [id, entry] of Object.entries(parsed)) {
    if (!isPlainObject(entry)) {
      throw new StoreFormatError(path, `entry "${id}" must be an object`);
    }
    putEntry(doc, id, entry);
  }
  return doc;
}

/**
 * JSON file store with bounded retry/backoff around file I/O.
 *
 * Only I/O failures are retried. A document that reads fine but is malformed
 * fails immediately with `StoreFormatError`.
 */
export class FileRecordStore implements RecordStore {
  readonly path: string;
  private readonly maxRetries: number;
  private readonly minDelayMs: number;
  private readonly fs: FileSystemLike;
  private readonly sleepImpl: (ms: number) => Promise<void>;

  constructor(
    path: string,
    {
      maxRetries = 3,
      minDelayMs = 50,
      fs = { readFile, writeFile },
      sleepImpl = sleep,
    }: FileRecordStoreOptions = {}
  ) {
    this.path = path;
    this.maxRetries = Math.max(maxRetries, 0);
    this.minDelayMs = Math.max(minDelayMs, 0);
    this.fs = fs;
    this.sleepImpl = sleepImpl;
  }

  private async withRetry<T>(op: () => Promise<T>): Promise<T> {
    let attempt = 0;
    let backoffMs = this.minDelayMs;

    while (true) {
      attempt += 1;
      try {
        return await op();
      } catch (err) {
        if (attempt <= this.maxRetries) {
          await this.sleepImpl(jitter(backoffMs));
          backoffMs = Math.min(backoffMs * 2, 8000);
          continue;
        }
        throw new StoreIoError(this.path, err);
      }
    }
  }

  async load(): Promise<PatientsDocument> {
    const text = await this.withRetry(() => this.fs.readFile(this.path, "utf8"));
    return parsePatientsDocument(text, this.path);
  }

  async save(doc: PatientsDocument): Promise<void> {
    const text = `${JSON.stringify(doc, null, 2)}\n`;
    await this.withRetry(() => this.fs.writeFile(this.path, text, "utf8"));
  }
}

function cloneDocument(doc: PatientsDocument): PatientsDocument {
  const copy: PatientsDocument = {};
  for (const [id, entry] of Object.entries(doc)) {
    const record: StoredPatient = { ...entry };
    putEntry(copy, id, record);
  }
  return copy;
}

/**
 * In-process store. Loads hand out copies, so mutating a loaded document
 * has no effect until it is saved.
 */
export class MemoryRecordStore implements RecordStore {
  private doc: PatientsDocument;
  saves = 0;

  constructor(initial: PatientsDocument = {}) {
    this.doc = cloneDocument(initial);
  }

  async load(): Promise<PatientsDocument> {
    return cloneDocument(this.doc);
  }

  async save(doc: PatientsDocument): Promise<void> {
    this.doc = cloneDocument(doc);
    this.saves += 1;
  }
}
