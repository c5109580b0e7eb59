export * from './lib/questrade-api/index.js'
export { getConfig, buildConfig } from './config/index.js'
export { buildLogger, logger, type AppLogger, type LogLevel } from './shared/log.js'
