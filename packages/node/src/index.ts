/**
 * @strata/node — HTTP service over the lending ledger and the pool engine.
 *
 * Public API for embedding the app; main.ts starts a server.
 */

export { StrataService } from "./services/strata-service.js";
export type { StrataServiceConfig } from "./services/strata-service.js";
export { ManualBlockClock, WallBlockClock } from "./services/block-clock.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
