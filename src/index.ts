/**
 * Public surface: the function handler, the runtime composer and the core
 * contracts integration code programs against.
 */
export * from "./core/index.js";
export { createRuntime, handler, type Runtime, type RuntimeOverrides } from "./main.js";
export { type Gateway, type GatewayStats, type ExecuteOptions } from "./application/gateway/gateway.js";
export * from "./application/services/index.js";
export * from "./infrastructure/cache/index.js";
export { loadConfig, parseConfig, type AppConfig } from "./infrastructure/config/config.js";
