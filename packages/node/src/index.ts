/**
 * @hindsight/node — Public API of the recorder application.
 */

export { EventHistoryService } from "./services/history-service.js";
export type { EventHistoryServiceConfig } from "./services/history-service.js";
export { EventBus } from "./event-bus.js";
export type { BusHandler, Subscription } from "./event-bus.js";
export { loadConfig, parseTypeHierarchy, ConfigSchema } from "./config.js";
export type { AppConfig, TypeDefinition } from "./config.js";
export { createLogger } from "./logger.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
