/**
 * @caixa-escolar/node — HTTP service for the grant ledger.
 *
 * Importing this module does not start a server; main.ts does.
 *
 * @packageDocumentation
 */

export { LedgerService } from "./services/ledger-service.js";
export type { LedgerServiceConfig, Persisted } from "./services/ledger-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
