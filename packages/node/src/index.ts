/**
 * @mintgate/node — HTTP service for the launchpad.
 *
 * @packageDocumentation
 */

export { LaunchpadService } from "./services/launchpad-service.js";
export type { LaunchpadServiceConfig } from "./services/launchpad-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
