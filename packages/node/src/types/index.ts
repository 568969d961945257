/**
 * Type barrel — re-exports all public types from @caixa-escolar/node.
 */

// DTOs
export {
  RegisterAccountSchema,
  RenameAccountSchema,
  AddProgramSchema,
  OpeningBalanceSchema,
  BalanceQuerySchema,
  PeriodParamsSchema,
  ProgramInputSchema,
  SavePeriodSchema,
  StatementQuerySchema,
  SummaryQuerySchema,
  OpenYearSchema,
} from "./dto.js";
export type {
  RegisterAccountDto,
  RenameAccountDto,
  AddProgramDto,
  OpeningBalanceDto,
  BalanceQuery,
  PeriodParams,
  SavePeriodDto,
  StatementQuery,
  SummaryQuery,
  OpenYearDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
