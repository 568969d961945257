/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. Amount signs are
 * left to the ledger, which names the offending program and field.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const LabelSchema = z.string().trim().min(1).max(128);

const AmountSchema = z.number().finite();

const YearSchema = z.coerce.number().int().min(1900).max(2100);

const MonthSchema = z.coerce.number().int().min(1).max(12);

// =============================================================================
// Account DTOs
// =============================================================================

export const RegisterAccountSchema = z.object({
  id: LabelSchema,
});

export type RegisterAccountDto = z.infer<typeof RegisterAccountSchema>;

export const RenameAccountSchema = z.object({
  newId: LabelSchema,
});

export type RenameAccountDto = z.infer<typeof RenameAccountSchema>;

export const AddProgramSchema = z.object({
  program: LabelSchema,
});

export type AddProgramDto = z.infer<typeof AddProgramSchema>;

export const OpeningBalanceSchema = z.object({
  capital: AmountSchema,
  custeio: AmountSchema,
});

export type OpeningBalanceDto = z.infer<typeof OpeningBalanceSchema>;

export const BalanceQuerySchema = z.object({
  program: LabelSchema,
  kind: z.enum(["Capital", "Custeio", "Total"]).default("Total"),
  month: MonthSchema,
  year: YearSchema,
});

export type BalanceQuery = z.infer<typeof BalanceQuerySchema>;

// =============================================================================
// Period DTOs
// =============================================================================

export const PeriodParamsSchema = z.object({
  year: YearSchema,
  month: MonthSchema,
});

export type PeriodParams = z.infer<typeof PeriodParamsSchema>;

export const ProgramInputSchema = z.object({
  program: LabelSchema,
  creditCapital: AmountSchema.default(0),
  creditCusteio: AmountSchema.default(0),
  debitCapital: AmountSchema.default(0),
  debitCusteio: AmountSchema.default(0),
});

/**
 * One month's figures. `programs` keeps the order the caller entered them,
 * which is the order the allocation reports.
 */
export const SavePeriodSchema = z.object({
  bankInterestTotal: AmountSchema.default(0),
  programs: z.array(ProgramInputSchema).superRefine((programs, ctx) => {
    const seen = new Set<string>();
    programs.forEach((p, index) => {
      if (seen.has(p.program)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "program"],
          message: `Program "${p.program}" appears more than once`,
        });
      }
      seen.add(p.program);
    });
  }),
});

export type SavePeriodDto = z.infer<typeof SavePeriodSchema>;

// =============================================================================
// Report DTOs
// =============================================================================

export const StatementQuerySchema = z.object({
  year: YearSchema,
  program: LabelSchema.default("*"),
});

export type StatementQuery = z.infer<typeof StatementQuerySchema>;

export const SummaryQuerySchema = z.object({
  year: YearSchema,
});

export type SummaryQuery = z.infer<typeof SummaryQuerySchema>;

// =============================================================================
// Fiscal Year DTOs
// =============================================================================

export const OpenYearSchema = z.object({
  year: z.number().int(),
});

export type OpenYearDto = z.infer<typeof OpenYearSchema>;
