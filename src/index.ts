export * from "./core/index.js";
export { loadConfig, ConfigError, type AppConfig } from "./config.js";
export { createConsoleLogger, noopLogger, type Logger, type LogLevel } from "./logger.js";
export { SearchContext, type SearchContextOptions } from "./http/context.js";
export { createHandler, createServer, startServer, type Reply, type RequestLine, type ServerOptions } from "./http/server.js";
