/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createPeriodRoutes } from "./periods.js";
export { createReportRoutes } from "./reports.js";
export { createYearRoutes } from "./years.js";
