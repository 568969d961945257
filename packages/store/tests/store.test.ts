/**
 * Tests for InMemoryLedgerStore and FileLedgerStore.
 *
 * Verifies:
 * - Save and load accounts
 * - Overwrite on repeated save
 * - Delete, including missing accounts
 * - Copy-first rename and its failure cases
 * - File persistence across store instances
 * - Integrity and format checks on load
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { copyFileSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Account } from "@caixa-escolar/types";
import { finalizeMovement } from "@caixa-escolar/ledger";
import { encodeAccount } from "../src/codec.js";
import { FileLedgerStore, computeRecordHash } from "../src/file-store.js";
import { InMemoryLedgerStore } from "../src/in-memory-store.js";
import type { LedgerStore } from "../src/types.js";
import { StoreError } from "../src/types.js";

const CLOCK = () => new Date("2024-06-15T12:00:00.000Z");

function makeAccount(id: string, credit = 10): Account {
  return {
    id,
    programs: ["P1", "P2"],
    openingBalances: {
      P1: { capital: 300, custeio: 0 },
      P2: { capital: 100, custeio: 25.5 },
    },
    movements: [
      finalizeMovement(
        "P1",
        { year: 2024, month: 5 },
        { creditCapital: credit, creditCusteio: 0, debitCapital: 0, debitCusteio: 0 },
        { interestCapital: 30, interestCusteio: 0 },
      ),
    ],
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof StoreError) return err.code;
    throw err;
  }
  return undefined;
}

// =============================================================================
// Shared test suite that runs against both implementations
// =============================================================================

function runSharedTests(createStore: () => LedgerStore) {
  describe("save and load", () => {
    it("starts empty", () => {
      expect(createStore().loadAllAccounts().size).toBe(0);
    });

    it("saves and loads an account", () => {
      const store = createStore();
      store.saveAccount("27.922-6", makeAccount("27.922-6"));

      const accounts = store.loadAllAccounts();

      expect(accounts.size).toBe(1);
      expect(accounts.get("27.922-6")).toEqual(makeAccount("27.922-6"));
    });

    it("overwrites on repeated save", () => {
      const store = createStore();
      store.saveAccount("A1", makeAccount("A1", 10));
      store.saveAccount("A1", makeAccount("A1", 99));

      const loaded = store.loadAllAccounts().get("A1");
      expect(loaded!.movements[0]!.creditCapital).toBe(99);
    });

    it("keeps accounts apart", () => {
      const store = createStore();
      store.saveAccount("A1", makeAccount("A1"));
      store.saveAccount("A2", makeAccount("A2"));

      expect([...store.loadAllAccounts().keys()].sort()).toEqual(["A1", "A2"]);
    });
  });

  describe("deleteAccount", () => {
    it("removes the record", () => {
      const store = createStore();
      store.saveAccount("A1", makeAccount("A1"));
      store.deleteAccount("A1");

      expect(store.loadAllAccounts().has("A1")).toBe(false);
    });

    it("is a no-op for a missing account", () => {
      const store = createStore();
      expect(() => store.deleteAccount("nope")).not.toThrow();
    });
  });

  describe("renameAccount", () => {
    it("moves the record to the new ID", () => {
      const store = createStore();
      store.saveAccount("27.922-6", makeAccount("27.922-6"));

      store.renameAccount("27.922-6", "27.922-7");

      const accounts = store.loadAllAccounts();
      expect(accounts.has("27.922-6")).toBe(false);
      expect(accounts.get("27.922-7")).toEqual(makeAccount("27.922-7"));
    });

    it("fails with ACCOUNT_EXISTS and touches neither record", () => {
      const store = createStore();
      store.saveAccount("A1", makeAccount("A1", 1));
      store.saveAccount("A2", makeAccount("A2", 2));

      expect(codeOf(() => store.renameAccount("A1", "A2"))).toBe("ACCOUNT_EXISTS");

      const accounts = store.loadAllAccounts();
      expect(accounts.get("A1")!.movements[0]!.creditCapital).toBe(1);
      expect(accounts.get("A2")!.movements[0]!.creditCapital).toBe(2);
    });

    it("fails with ACCOUNT_NOT_FOUND for a missing source", () => {
      const store = createStore();
      expect(codeOf(() => store.renameAccount("nope", "other"))).toBe("ACCOUNT_NOT_FOUND");
      expect(store.loadAllAccounts().size).toBe(0);
    });
  });

  it("reports itself available", () => {
    expect(createStore().isAvailable()).toBe(true);
  });
}

// =============================================================================
// InMemoryLedgerStore
// =============================================================================

describe("InMemoryLedgerStore", () => {
  runSharedTests(() => new InMemoryLedgerStore({ clock: CLOCK }));

  it("decodes older documents seeded as-is", () => {
    const store = new InMemoryLedgerStore({ clock: CLOCK });
    store.putDocument("A1", {
      programas: ["P1"],
      movimentacoes: [{ programa: "P1", mes_num: 1, rendimento_custeio: 2 }],
    });

    const account = store.loadAllAccounts().get("A1");

    expect(account!.openingBalances).toEqual({ P1: { capital: 0, custeio: 0 } });
    expect(account!.movements[0]!.year).toBe(2024);
    expect(account!.movements[0]!.totalInterest).toBe(2);
  });

  it("rejects a malformed seeded document on load", () => {
    const store = new InMemoryLedgerStore();
    store.putDocument("A1", { movimentacoes: "none" });
    expect(codeOf(() => store.loadAllAccounts())).toBe("INVALID_RECORD");
  });
});

// =============================================================================
// FileLedgerStore
// =============================================================================

describe("FileLedgerStore", () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), "caixa-escolar-store-"));
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  runSharedTests(() => new FileLedgerStore({ baseDir, clock: CLOCK }));

  function onlyFile(): string {
    const files = readdirSync(baseDir);
    expect(files).toHaveLength(1);
    return join(baseDir, files[0]!);
  }

  it("persists across store instances", () => {
    new FileLedgerStore({ baseDir }).saveAccount("A1", makeAccount("A1"));

    const reopened = new FileLedgerStore({ baseDir });
    expect(reopened.loadAllAccounts().get("A1")).toEqual(makeAccount("A1"));
  });

  it("writes the record envelope", () => {
    const store = new FileLedgerStore({ baseDir, clock: CLOCK });
    store.saveAccount("A1", makeAccount("A1"));

    const record: unknown = JSON.parse(readFileSync(onlyFile(), "utf-8"));

    expect(record).toEqual({
      accountId: "A1",
      savedAt: "2024-06-15T12:00:00.000Z",
      stateHash: computeRecordHash(encodeAccount(makeAccount("A1"))),
      account: encodeAccount(makeAccount("A1")),
    });
  });

  it("keeps IDs that sanitize to the same name apart", () => {
    const store = new FileLedgerStore({ baseDir });
    store.saveAccount("a/b", makeAccount("a/b"));
    store.saveAccount("a_b", makeAccount("a_b"));

    expect(readdirSync(baseDir)).toHaveLength(2);
    expect([...store.loadAllAccounts().keys()].sort()).toEqual(["a/b", "a_b"]);
  });

  it("detects a tampered record", () => {
    const store = new FileLedgerStore({ baseDir });
    store.saveAccount("A1", makeAccount("A1"));

    const path = onlyFile();
    const content = readFileSync(path, "utf-8").replace('"P2"', '"P3"');
    writeFileSync(path, content, "utf-8");

    expect(codeOf(() => store.loadAllAccounts())).toBe("INTEGRITY_FAILURE");
  });

  it("rejects two files holding the same account", () => {
    const store = new FileLedgerStore({ baseDir });
    store.saveAccount("A1", makeAccount("A1"));
    copyFileSync(onlyFile(), join(baseDir, "zz-copy.json"));

    try {
      store.loadAllAccounts();
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(StoreError);
      const storeErr = err as StoreError;
      expect(storeErr.code).toBe("INVALID_RECORD");
      expect(storeErr.accountId).toBe("A1");
      expect(storeErr.details).toEqual({ file: "zz-copy.json" });
    }
  });

  it("rejects a file that is not JSON", () => {
    writeFileSync(join(baseDir, "broken.json"), "{ not json", "utf-8");
    expect(codeOf(() => new FileLedgerStore({ baseDir }).loadAllAccounts())).toBe("INVALID_RECORD");
  });

  it("ignores files that are not records", () => {
    writeFileSync(join(baseDir, "notes.txt"), "hello", "utf-8");
    expect(new FileLedgerStore({ baseDir }).loadAllAccounts().size).toBe(0);
  });

  it("loads a record holding an older document", () => {
    const legacy = { programas: ["P1"], saldos_iniciais: { P1: { Capital: 5, Custeio: 1 } } };
    writeFileSync(
      join(baseDir, "legacy.json"),
      JSON.stringify({
        accountId: "A1",
        savedAt: "2023-01-01T00:00:00.000Z",
        stateHash: computeRecordHash(legacy),
        account: legacy,
      }),
      "utf-8",
    );
    const store = new FileLedgerStore({ baseDir, clock: CLOCK });

    expect(store.loadAllAccounts().get("A1")!.openingBalances).toEqual({
      P1: { capital: 5, custeio: 1 },
    });
  });

  it("fails with STORE_UNAVAILABLE when the directory cannot be created", () => {
    const blocker = join(baseDir, "blocker");
    writeFileSync(blocker, "", "utf-8");

    expect(codeOf(() => new FileLedgerStore({ baseDir: join(blocker, "accounts") }))).toBe(
      "STORE_UNAVAILABLE",
    );
  });
});
