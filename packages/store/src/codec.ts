/**
 * @caixa-escolar/store — Account record codec.
 *
 * Translates between the in-memory Account and the persisted document:
 *
 *   { programs, saldosIniciais: { [program]: { Capital, Custeio } },
 *     movimentacoes: [ { programa, mes_num, ano, credito_capital, ... } ] }
 *
 * Rules:
 * - Documents are validated with Zod before anything is trusted
 * - `ano` may be missing on older records; it reads as the current year
 * - The older keys `programas` / `saldos_iniciais` are read, never written
 * - Derived totals are recomputed on read; stored totals are ignored
 */

import { z } from "zod";
import type { Account, Movement, OpeningBalance } from "@caixa-escolar/types";
import { finalizeMovement } from "@caixa-escolar/ledger";
import { StoreError } from "./types.js";

// =============================================================================
// Persisted shapes
// =============================================================================

export interface PersistedOpeningBalance {
  readonly Capital: number;
  readonly Custeio: number;
}

export interface PersistedMovement {
  readonly programa: string;
  readonly mes_num: number;
  readonly ano: number;
  readonly credito_capital: number;
  readonly credito_custeio: number;
  readonly debito_capital: number;
  readonly debito_custeio: number;
  readonly rendimento_capital: number;
  readonly rendimento_custeio: number;
  readonly total_credito: number;
  readonly total_debito: number;
  readonly total_rendimento: number;
}

export interface PersistedAccount {
  readonly programs: readonly string[];
  readonly saldosIniciais: Readonly<Record<string, PersistedOpeningBalance>>;
  readonly movimentacoes: readonly PersistedMovement[];
}

// =============================================================================
// Schemas
// =============================================================================

const Amount = z.number().finite();

const OpeningBalanceSchema = z.object({
  Capital: Amount.default(0),
  Custeio: Amount.default(0),
});

const PersistedMovementSchema = z.object({
  programa: z.string().min(1),
  mes_num: z.number().int().min(1).max(12),
  ano: z.number().int().optional(),
  credito_capital: Amount.default(0),
  credito_custeio: Amount.default(0),
  debito_capital: Amount.default(0),
  debito_custeio: Amount.default(0),
  rendimento_capital: Amount.default(0),
  rendimento_custeio: Amount.default(0),
  total_credito: Amount.optional(),
  total_debito: Amount.optional(),
  total_rendimento: Amount.optional(),
});

export const PersistedAccountSchema = z.object({
  programs: z.array(z.string().min(1)).optional(),
  programas: z.array(z.string().min(1)).optional(),
  saldosIniciais: z.record(OpeningBalanceSchema).optional(),
  saldos_iniciais: z.record(OpeningBalanceSchema).optional(),
  movimentacoes: z.array(PersistedMovementSchema).default([]),
});

export interface DecodeOptions {
  /** Clock used to date records without `ano`. Default: system time */
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Encode / Decode
// =============================================================================

function encodeMovement(m: Movement): PersistedMovement {
  return {
    programa: m.program,
    mes_num: m.month,
    ano: m.year,
    credito_capital: m.creditCapital,
    credito_custeio: m.creditCusteio,
    debito_capital: m.debitCapital,
    debito_custeio: m.debitCusteio,
    rendimento_capital: m.interestCapital,
    rendimento_custeio: m.interestCusteio,
    total_credito: m.totalCredit,
    total_debito: m.totalDebit,
    total_rendimento: m.totalInterest,
  };
}

/**
 * Encode an account into its persisted document.
 */
export function encodeAccount(account: Account): PersistedAccount {
  const saldosIniciais: Record<string, PersistedOpeningBalance> = {};
  for (const program of account.programs) {
    const opening = account.openingBalances[program];
    saldosIniciais[program] = {
      Capital: opening?.capital ?? 0,
      Custeio: opening?.custeio ?? 0,
    };
  }

  return {
    programs: [...account.programs],
    saldosIniciais,
    movimentacoes: account.movements.map(encodeMovement),
  };
}

/**
 * Decode and validate a persisted document.
 *
 * @throws StoreError INVALID_RECORD with the Zod issues when the document is malformed,
 *   or when a program is listed twice or a (program, year, month) slot holds two movements
 */
export function decodeAccount(id: string, document: unknown, options?: DecodeOptions): Account {
  const parsed = PersistedAccountSchema.safeParse(document);
  if (!parsed.success) {
    throw new StoreError("INVALID_RECORD", `Invalid record for account "${id}"`, id, {
      issues: parsed.error.issues,
    });
  }

  const doc = parsed.data;
  const currentYear = (options?.clock ?? (() => new Date()))().getFullYear();
  const programs = doc.programs ?? doc.programas ?? [];
  const stored = doc.saldosIniciais ?? doc.saldos_iniciais ?? {};

  const listed = new Set<string>();
  for (const program of programs) {
    if (listed.has(program)) {
      throw new StoreError(
        "INVALID_RECORD",
        `Program "${program}" is listed twice in account "${id}"`,
        id,
        { program },
      );
    }
    listed.add(program);
  }

  const openingBalances: Record<string, OpeningBalance> = {};
  for (const program of programs) {
    const entry = stored[program];
    openingBalances[program] = { capital: entry?.Capital ?? 0, custeio: entry?.Custeio ?? 0 };
  }

  const movements = doc.movimentacoes.map((m) =>
    finalizeMovement(
      m.programa,
      { year: m.ano ?? currentYear, month: m.mes_num },
      {
        creditCapital: m.credito_capital,
        creditCusteio: m.credito_custeio,
        debitCapital: m.debito_capital,
        debitCusteio: m.debito_custeio,
      },
      { interestCapital: m.rendimento_capital, interestCusteio: m.rendimento_custeio },
    ),
  );

  // Year defaulting can make a legacy movement collide with a dated one
  const slots = new Set<string>();
  for (const m of movements) {
    const slot = `${m.program}\u0000${m.year}\u0000${m.month}`;
    if (slots.has(slot)) {
      throw new StoreError(
        "INVALID_RECORD",
        `Account "${id}" has more than one movement for "${m.program}" in ${m.year}-${m.month}`,
        id,
        { program: m.program, year: m.year, month: m.month },
      );
    }
    slots.add(slot);
  }

  return { id, programs, openingBalances, movements };
}
