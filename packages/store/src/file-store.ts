/**
 * @caixa-escolar/store — File-based ledger store.
 *
 * Stores each account as a JSON file in a base directory:
 *   <baseDir>/<sanitized-id>-<id-hash>.json
 *
 * Each file wraps the persisted document with its account ID, the save
 * time and a SHA-256 hash of the canonical document, checked on load.
 * Two files naming the same account fail the load.
 *
 * Suitable for development and small-scale production use.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { Account } from "@caixa-escolar/types";
import { decodeAccount, encodeAccount } from "./codec.js";
import type { PersistedAccount } from "./codec.js";
import type { LedgerStore } from "./types.js";
import { StoreError } from "./types.js";

// =============================================================================
// Record envelope
// =============================================================================

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a record.
 */
export function computeRecordHash(record: unknown): string {
  return createHash("sha256").update(canonicalize(record)).digest("hex");
}

/**
 * One account file on disk.
 */
export interface StoredRecord {
  readonly accountId: string;
  readonly savedAt: string;
  readonly stateHash: string;
  readonly account: PersistedAccount;
}

const StoredRecordSchema = z.object({
  accountId: z.string().min(1),
  savedAt: z.string(),
  stateHash: z.string(),
  account: z.record(z.unknown()),
});

export interface FileLedgerStoreOptions {
  /** Directory holding one file per account */
  readonly baseDir: string;
  /** Clock for `savedAt` and for dating records without `ano`. Default: system time */
  readonly clock?: (() => Date) | undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Store
// =============================================================================

export class FileLedgerStore implements LedgerStore {
  private readonly _baseDir: string;
  private readonly _clock: () => Date;

  constructor(options: FileLedgerStoreOptions) {
    this._baseDir = options.baseDir;
    this._clock = options.clock ?? (() => new Date());
    this._io("create store directory", () => mkdirSync(this._baseDir, { recursive: true }));
  }

  loadAllAccounts(): Map<string, Account> {
    const files = this._io("list records", () =>
      readdirSync(this._baseDir).filter((f) => f.endsWith(".json")).sort(),
    );

    const accounts = new Map<string, Account>();
    for (const file of files) {
      const path = join(this._baseDir, file);
      const content = this._io(`read ${file}`, () => readFileSync(path, "utf-8"));
      const record = this._parseRecord(file, content);
      if (accounts.has(record.accountId)) {
        throw new StoreError(
          "INVALID_RECORD",
          `Account "${record.accountId}" is stored in more than one file; ${file} is a duplicate`,
          record.accountId,
          { file },
        );
      }
      accounts.set(
        record.accountId,
        decodeAccount(record.accountId, record.account, { clock: this._clock }),
      );
    }
    return accounts;
  }

  saveAccount(id: string, account: Account): void {
    this._write(id, encodeAccount(account));
  }

  deleteAccount(id: string): void {
    const path = this._recordPath(id);
    this._io(`delete account "${id}"`, () => {
      if (existsSync(path)) unlinkSync(path);
    });
  }

  renameAccount(oldId: string, newId: string): void {
    const oldPath = this._recordPath(oldId);
    const newPath = this._recordPath(newId);

    if (!this._io("check records", () => existsSync(oldPath))) {
      throw new StoreError("ACCOUNT_NOT_FOUND", `No record for account "${oldId}"`, oldId);
    }
    if (this._io("check records", () => existsSync(newPath))) {
      throw new StoreError("ACCOUNT_EXISTS", `Account "${newId}" already exists`, newId);
    }

    const content = this._io(`read account "${oldId}"`, () => readFileSync(oldPath, "utf-8"));
    const record = this._parseRecord(oldPath, content);

    // Copy first; the old record is only removed once the new one is on disk.
    // Going through the codec writes a legacy document back in the current shape.
    const account = decodeAccount(oldId, record.account, { clock: this._clock });
    this._write(newId, encodeAccount(account));
    this._io(`delete account "${oldId}"`, () => unlinkSync(oldPath));
  }

  isAvailable(): boolean {
    try {
      mkdirSync(this._baseDir, { recursive: true });
      return existsSync(this._baseDir);
    } catch {
      return false;
    }
  }

  /** Get the base directory for this store */
  get baseDir(): string {
    return this._baseDir;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _recordPath(id: string): string {
    // Sanitized IDs can collide ("a/b" and "a_b"); the hash suffix keeps them apart
    const safe = id.replace(/[^a-zA-Z0-9_.-]/g, "_");
    const suffix = createHash("sha256").update(id).digest("hex").slice(0, 8);
    return join(this._baseDir, `${safe}-${suffix}.json`);
  }

  private _write(id: string, document: PersistedAccount): void {
    const record: StoredRecord = {
      accountId: id,
      savedAt: this._clock().toISOString(),
      stateHash: computeRecordHash(document),
      account: document,
    };
    const path = this._recordPath(id);
    this._io(`write account "${id}"`, () =>
      writeFileSync(path, JSON.stringify(record, null, 2), "utf-8"),
    );
  }

  /**
   * Parse and verify one file. The document itself is validated later,
   * by the codec.
   */
  private _parseRecord(
    file: string,
    content: string,
  ): { readonly accountId: string; readonly account: unknown } {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new StoreError("INVALID_RECORD", `${file} is not valid JSON: ${messageOf(err)}`);
    }

    const parsed = StoredRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreError("INVALID_RECORD", `${file} is not an account record`, undefined, {
        issues: parsed.error.issues,
      });
    }

    const { accountId, stateHash, account } = parsed.data;
    if (computeRecordHash(account) !== stateHash) {
      throw new StoreError(
        "INTEGRITY_FAILURE",
        `Stored hash does not match the record for account "${accountId}"`,
        accountId,
      );
    }

    return { accountId, account };
  }

  /**
   * Run a filesystem call, reporting any failure as STORE_UNAVAILABLE.
   */
  private _io<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreError("STORE_UNAVAILABLE", `Could not ${what}: ${messageOf(err)}`);
    }
  }
}
