// Export all functionality from the AppConfig module
export { getConfig, buildConfig } from './appConfig.js'
