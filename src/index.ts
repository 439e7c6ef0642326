export * from './modules/topline-dashboard/index.js';
export { createConfig, parseEnv, type AppConfig, type Env } from './infra/config/env.js';
export { createLogger, type Logger, type LoggerConfig, type LogLevel } from './infra/logger/index.js';
