export { createAppConfig, getConfigurationSummary, type AppConfig } from './app-config.js';
export * from './defaults.js';
