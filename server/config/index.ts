/**
 * Configuration Module
 *
 * Barrel export for environment-driven application configuration
 */

export {
  // Types
  type AppConfig,
  type LlmTask,
  type LlmProvider,
  type LlmRoute,

  // Constants
  LLM_TASKS,
  DEFAULT_LLM_ROUTES,

  // Validation
  ConfigValidationError,
  parseLlmRoute,

  // Loader
  loadAppConfig,
} from './app-config.js';
