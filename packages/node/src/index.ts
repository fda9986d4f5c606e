/**
 * @allotment/node — Package public API.
 */

export { AllocationService, ISSUED_TOKENS, systemClock } from "./services/allocation-service.js";
export type {
  AllocationServiceConfig,
  PlanView,
  GrantView,
  HolderView,
  PositionView,
  PoolView,
  PoolsSummary,
  ClaimView,
  RevocationView,
  DebtWriteOffView,
} from "./services/allocation-service.js";
export { loadConfig, parseApiKeys, apiKeyMap, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
