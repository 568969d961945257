#!/usr/bin/env node
/**
 * @caixa-escolar/demo — Interactive CLI walkthrough.
 *
 * Runs one school account through a fiscal year in your terminal:
 * register -> programs -> opening balances -> monthly entries ->
 * interest allocation -> month correction -> statement -> summary ->
 * save -> reload
 *
 * Uses real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import { AccountBook, TOTAL_LABEL, amountsEqual, sumBy } from "@caixa-escolar/ledger";
import type { AllocationSummary, StatementRow } from "@caixa-escolar/ledger";
import { InMemoryLedgerStore } from "@caixa-escolar/store";
import type { MovementInput } from "@caixa-escolar/types";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;
const ACCOUNT = "EM Monteiro Lobato";
const YEAR = 2024;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function money(value: number): string {
  return value.toFixed(2).padStart(10);
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                   CAIXA ESCOLAR DEMO                     ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Grant ledger and interest allocation           ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function printAllocation(summary: AllocationSummary): void {
  for (const p of summary.programs) {
    info(
      p.program,
      `base ${money(p.baseCapital + p.baseCusteio)}  capital ${(p.capitalShare * 100).toFixed(1)}%  custeio ${(p.custeioShare * 100).toFixed(1)}%`,
    );
  }
  const allocated = sumBy(summary.movements, (m) => m.totalInterest);
  info("allocated", `${money(allocated)} of ${money(summary.bankInterestTotal)}`);
  if (summary.dropped) {
    warn("No program had a positive balance; bank interest was not allocated");
  }
}

function printStatement(rows: readonly StatementRow[]): void {
  console.log(
    chalk.gray(
      `    ${"Program".padEnd(10)}${"Month".padEnd(12)}${"Credit".padStart(10)}${"Interest".padStart(10)}${"Debit".padStart(10)}${"Balance".padStart(10)}`,
    ),
  );
  for (const row of rows) {
    const line =
      `    ${row.program.padEnd(10)}${row.monthName.padEnd(12)}` +
      `${money(row.credit)}${money(row.interest)}${money(row.debit)}${money(row.runningTotal)}`;
    console.log(row.program === TOTAL_LABEL ? chalk.white.bold(line) : chalk.white(line));
  }
}

function entry(credit: number, debit: number, kind: "capital" | "custeio" = "custeio"): MovementInput {
  return kind === "capital"
    ? { creditCapital: credit, creditCusteio: 0, debitCapital: debit, debitCusteio: 0 }
    : { creditCapital: 0, creditCusteio: credit, debitCapital: 0, debitCusteio: debit };
}

const TOTAL_STEPS = 9;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  One school account, two grant programs, one fiscal year."));
  console.log(chalk.gray("  Every step uses real domain packages, no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Register ───────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Register Account");

  const clock = (): Date => new Date(`${YEAR}-12-31T12:00:00.000Z`);
  const book = new AccountBook({ clock });
  book.registerAccount(ACCOUNT);
  ok(`Account registered: ${ACCOUNT}`);
  info("fiscal years", book.years().join(", "));

  await sleep(DELAY_MS);

  // ─── Step 2: Programs ───────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Grant Programs");

  book.addProgram(ACCOUNT, "PDDE");
  book.addProgram(ACCOUNT, "PNAE");
  ok("Programs added: PDDE, PNAE");

  await sleep(DELAY_MS);

  // ─── Step 3: Opening Balances ───────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Opening Balances");

  book.setOpeningBalance(ACCOUNT, "PDDE", { capital: 1000, custeio: 2000 });
  book.setOpeningBalance(ACCOUNT, "PNAE", { capital: 0, custeio: 1000 });
  info("PDDE", `capital ${money(1000)}  custeio ${money(2000)}`);
  info("PNAE", `capital ${money(0)}  custeio ${money(1000)}`);
  ok("Opening balances recorded");

  await sleep(DELAY_MS);

  // ─── Step 4: January ────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "January Entries + Bank Interest");

  const january = book.savePeriod(
    ACCOUNT,
    1,
    YEAR,
    40,
    new Map([
      ["PDDE", entry(500, 0)],
      ["PNAE", entry(0, 0)],
    ]),
  );
  printAllocation(january);
  ok("January saved");

  await sleep(DELAY_MS);

  // ─── Step 5: March ──────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "March Entries");

  const march = book.savePeriod(
    ACCOUNT,
    3,
    YEAR,
    25,
    new Map([
      ["PDDE", entry(0, 800, "capital")],
      ["PNAE", entry(0, 300)],
    ]),
  );
  printAllocation(march);
  ok("March saved (February has no entries and carries the balance)");

  await sleep(DELAY_MS);

  // ─── Step 6: Correction ─────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Correct March");

  const view = book.describePeriod(ACCOUNT, 3, YEAR);
  info("editing", String(view.editing));
  info("bank interest", money(view.bankInterestTotal));

  const corrected = book.savePeriod(
    ACCOUNT,
    3,
    YEAR,
    25,
    new Map([["PDDE", entry(0, 700, "capital")]]),
  );
  printAllocation(corrected);
  ok("March replaced; PNAE no longer has a March entry");

  await sleep(DELAY_MS);

  // ─── Step 7: Statement ──────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, `Statement ${YEAR}`);

  printStatement(book.statement(ACCOUNT, "*", YEAR));

  const pdde = book.balance(ACCOUNT, "PDDE", "Total", 12, YEAR);
  info("PDDE in Dec", money(pdde));

  await sleep(DELAY_MS);

  // ─── Step 8: Summary ────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, `Year Summary ${YEAR}`);

  const summary = book.yearSummary(ACCOUNT, YEAR);
  for (const p of summary.programs) {
    info(p.program, `closing ${money(p.closingTotal)}`);
  }
  info("credit", money(summary.credit));
  info("interest", money(summary.interest));
  info("debit", money(summary.debit));
  info("closing", money(summary.closingTotal));

  await sleep(DELAY_MS);

  // ─── Step 9: Save and Reload ────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Save and Reload");

  const store = new InMemoryLedgerStore({ clock });
  for (const account of book.getAll()) {
    store.saveAccount(account.id, account);
  }
  ok(`${store.size} account(s) saved`);

  const reloaded = new AccountBook({ accounts: store.loadAllAccounts().values(), clock });
  const reloadedTotal = reloaded.yearSummary(ACCOUNT, YEAR).closingTotal;
  info("closing", money(reloadedTotal));

  if (amountsEqual(reloadedTotal, summary.closingTotal)) {
    ok(chalk.green.bold("RELOADED") + " balances match the saved ledger");
  } else {
    warn("Reloaded balances differ from the saved ledger");
  }

  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
