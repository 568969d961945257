/**
 * Test helpers for @caixa-escolar/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server, over an in-memory store.
 */

import type { Account } from "@caixa-escolar/types";
import { InMemoryLedgerStore, StoreError } from "@caixa-escolar/store";
import type { LedgerStore } from "@caixa-escolar/store";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const TEST_CLOCK = (): Date => new Date("2024-06-15T12:00:00.000Z");

export interface TestApp extends AppInstance {
  readonly store: LedgerStore;
}

/**
 * Create a test app with a fixed clock and an in-memory store.
 */
export function createTestApp(options?: Partial<CreateAppOptions>): TestApp {
  const store = options?.store ?? new InMemoryLedgerStore({ clock: TEST_CLOCK });
  const instance = createApp({ clock: TEST_CLOCK, ...options, store });
  return { ...instance, store };
}

/**
 * A store that can be switched off. While down, every call throws
 * STORE_UNAVAILABLE; while up, it delegates to an in-memory store.
 */
export class FlakyLedgerStore implements LedgerStore {
  readonly inner = new InMemoryLedgerStore({ clock: TEST_CLOCK });
  down = false;

  loadAllAccounts(): Map<string, Account> {
    this._check();
    return this.inner.loadAllAccounts();
  }

  saveAccount(id: string, account: Account): void {
    this._check();
    this.inner.saveAccount(id, account);
  }

  deleteAccount(id: string): void {
    this._check();
    this.inner.deleteAccount(id);
  }

  renameAccount(oldId: string, newId: string): void {
    this._check();
    this.inner.renameAccount(oldId, newId);
  }

  isAvailable(): boolean {
    return !this.down;
  }

  private _check(): void {
    if (this.down) {
      throw new StoreError("STORE_UNAVAILABLE", "Store is down");
    }
  }
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Register an account with programs and opening balances through the API.
 */
export async function seedAccount(
  app: AppInstance["app"],
  id: string,
  programs: Readonly<Record<string, { capital: number; custeio: number }>>,
): Promise<void> {
  await app.request(jsonRequest("/api/v1/accounts", "POST", { id }));
  for (const [program, balance] of Object.entries(programs)) {
    await app.request(jsonRequest(`/api/v1/accounts/${encodeURIComponent(id)}/programs`, "POST", { program }));
    await app.request(
      jsonRequest(
        `/api/v1/accounts/${encodeURIComponent(id)}/programs/${encodeURIComponent(program)}/opening-balance`,
        "PUT",
        balance,
      ),
    );
  }
}
