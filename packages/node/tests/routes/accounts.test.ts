/**
 * Tests for account routes.
 *
 * Verifies:
 * - Register, list, get and delete
 * - Rename, including the existing-target failure
 * - Programs and opening balances
 * - Balance lookups before a month
 */

import { describe, it, expect } from "vitest";
import type { Account } from "@caixa-escolar/types";
import { createTestApp, jsonRequest, seedAccount } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

describe("POST /api/v1/accounts", () => {
  it("registers an empty account", async () => {
    const { app, store } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/accounts", "POST", { id: "27.922-6" }));

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: Account; persisted: boolean };
    expect(body).toEqual({
      data: { id: "27.922-6", programs: [], openingBalances: {}, movements: [] },
      persisted: true,
    });
    expect(store.loadAllAccounts().has("27.922-6")).toBe(true);
  });

  it("returns 409 for a duplicate ID", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/api/v1/accounts", "POST", { id: "A1" }));
    const res = await app.request(jsonRequest("/api/v1/accounts", "POST", { id: "A1" }));

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("DUPLICATE_ACCOUNT");
  });

  it("returns 400 for a blank ID", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/accounts", "POST", { id: "   " }));

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details!["issues"]).toHaveLength(1);
  });

  it("returns 400 for a body that is not JSON", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/api/v1/accounts", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{ nope",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid JSON in request body");
  });
});

describe("GET /api/v1/accounts", () => {
  it("lists account IDs with their programs", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 0, custeio: 0 } });
    await seedAccount(app, "A2", {});

    const res = await app.request("/api/v1/accounts");
    const body = (await res.json()) as { data: { id: string; programs: string[] }[] };

    expect(body.data).toEqual([
      { id: "A1", programs: ["P1"] },
      { id: "A2", programs: [] },
    ]);
  });
});

describe("GET /api/v1/accounts/:id", () => {
  it("returns the account with an ETag", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 150, custeio: 0 } });

    const res = await app.request("/api/v1/accounts/A1");

    expect(res.status).toBe(200);
    expect(res.headers.get("ETag")).toMatch(/^"[0-9a-f]{16}"$/);
    const body = (await res.json()) as { data: Account };
    expect(body.data.openingBalances).toEqual({ P1: { capital: 150, custeio: 0 } });
  });

  it("returns the same ETag for an unchanged account", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", {});

    const first = await app.request("/api/v1/accounts/A1");
    const second = await app.request("/api/v1/accounts/A1");

    expect(first.headers.get("ETag")).toBe(second.headers.get("ETag"));
  });

  it("returns 404 for an unknown account", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/accounts/nope");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNKNOWN_ACCOUNT", message: 'Unknown account: "nope"' });
  });
});

describe("DELETE /api/v1/accounts/:id", () => {
  it("removes the account from the book and the store", async () => {
    const { app, store } = createTestApp();
    await seedAccount(app, "A1", {});

    const res = await app.request(jsonRequest("/api/v1/accounts/A1", "DELETE"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { id: "A1" }, persisted: true });
    expect(store.loadAllAccounts().size).toBe(0);
    expect((await app.request("/api/v1/accounts/A1")).status).toBe(404);
  });
});

describe("POST /api/v1/accounts/:id/rename", () => {
  it("moves the account to the new ID", async () => {
    const { app, store } = createTestApp();
    await seedAccount(app, "27.922-6", { P1: { capital: 10, custeio: 5 } });

    const res = await app.request(
      jsonRequest("/api/v1/accounts/27.922-6/rename", "POST", { newId: "27.922-7" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Account; persisted: boolean };
    expect(body.data.id).toBe("27.922-7");
    expect(body.data.openingBalances).toEqual({ P1: { capital: 10, custeio: 5 } });
    expect(body.persisted).toBe(true);
    expect([...store.loadAllAccounts().keys()]).toEqual(["27.922-7"]);
  });

  it("fails when the target exists and leaves both accounts unchanged", async () => {
    const { app, store } = createTestApp();
    await seedAccount(app, "27.922-6", { P1: { capital: 1, custeio: 0 } });
    await seedAccount(app, "27.922-7", { P2: { capital: 2, custeio: 0 } });

    const res = await app.request(
      jsonRequest("/api/v1/accounts/27.922-6/rename", "POST", { newId: "27.922-7" }),
    );

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("DUPLICATE_ACCOUNT");

    const stored = store.loadAllAccounts();
    expect(stored.get("27.922-6")!.programs).toEqual(["P1"]);
    expect(stored.get("27.922-7")!.programs).toEqual(["P2"]);
  });
});

describe("programs and opening balances", () => {
  it("adds a program with a zero opening balance", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", {});

    const res = await app.request(
      jsonRequest("/api/v1/accounts/A1/programs", "POST", { program: "PDDE Qualidade" }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: Account };
    expect(body.data.programs).toEqual(["PDDE Qualidade"]);
    expect(body.data.openingBalances).toEqual({ "PDDE Qualidade": { capital: 0, custeio: 0 } });
  });

  it("returns 409 for a duplicate program", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 0, custeio: 0 } });

    const res = await app.request(
      jsonRequest("/api/v1/accounts/A1/programs", "POST", { program: "P1" }),
    );

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("DUPLICATE_PROGRAM");
  });

  it("sets an opening balance", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 0, custeio: 0 } });

    const res = await app.request(
      jsonRequest("/api/v1/accounts/A1/programs/P1/opening-balance", "PUT", {
        capital: 150.25,
        custeio: -10,
      }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Account; persisted: boolean };
    expect(body.data.openingBalances["P1"]).toEqual({ capital: 150.25, custeio: -10 });
    expect(body.persisted).toBe(true);
  });

  it("returns 404 for an unknown program", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", {});

    const res = await app.request(
      jsonRequest("/api/v1/accounts/A1/programs/P9/opening-balance", "PUT", {
        capital: 1,
        custeio: 1,
      }),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNKNOWN_PROGRAM");
  });

  it("returns 400 for a non-numeric balance", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 0, custeio: 0 } });

    const res = await app.request(
      jsonRequest("/api/v1/accounts/A1/programs/P1/opening-balance", "PUT", {
        capital: "150",
        custeio: 0,
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/accounts/:id/balance", () => {
  it("resolves the balance before a month", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 150, custeio: 0 } });
    await app.request(
      jsonRequest("/api/v1/accounts/A1/periods/2024/1", "PUT", {
        bankInterestTotal: 10,
        programs: [{ program: "P1" }],
      }),
    );

    const jan = await app.request("/api/v1/accounts/A1/balance?program=P1&kind=Total&month=1&year=2024");
    const feb = await app.request("/api/v1/accounts/A1/balance?program=P1&kind=Total&month=2&year=2024");

    expect(((await jan.json()) as { data: { balance: number } }).data.balance).toBe(150);
    expect(await feb.json()).toEqual({
      data: { accountId: "A1", program: "P1", kind: "Total", month: 2, year: 2024, balance: 160 },
    });
  });

  it("defaults the kind to Total", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 3, custeio: 4 } });

    const res = await app.request("/api/v1/accounts/A1/balance?program=P1&month=1&year=2024");
    const body = (await res.json()) as { data: { kind: string; balance: number } };

    expect(body.data.kind).toBe("Total");
    expect(body.data.balance).toBe(7);
  });

  it("returns 400 when the month is missing", async () => {
    const { app } = createTestApp();
    await seedAccount(app, "A1", { P1: { capital: 0, custeio: 0 } });

    const res = await app.request("/api/v1/accounts/A1/balance?program=P1&year=2024");

    expect(res.status).toBe(400);
  });
});
