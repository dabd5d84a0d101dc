import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

// Import environment-specific configurations
import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  PRINCIPAL_CONFIG,
  BUDGET_CONFIG,
  COORDINATION_CONFIG,
  HEARTBEAT_CONFIG,
  MONGODB_URI,
  MONGODB_CONFIG,
  STORE_CONFIG,
  CACHE_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * This consolidates all environment-specific settings.
 * Budget, coordination, store and cache values are validated by
 * loadBudgetSettings() before any component is constructed.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
  },

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Principals
  principals: PRINCIPAL_CONFIG,

  // Budget
  budget: BUDGET_CONFIG,

  // Coordination
  coordination: COORDINATION_CONFIG,
  heartbeat: HEARTBEAT_CONFIG,

  // Ledger store
  store: STORE_CONFIG,

  // Cache
  cache: CACHE_CONFIG,

  // Logging
  logging: LOG_CONFIG,
};

export { BudgetSettings, ConfigError, loadBudgetSettings, validateBudgetSettings } from './settings';
