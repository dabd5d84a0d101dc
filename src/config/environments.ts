/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, BUDGET_CONFIG, STORE_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const limit = BUDGET_CONFIG.dailyLimit;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// PRINCIPALS
// =============================================================================

/**
 * The principal this process acts for, and the peer it coordinates with
 */
export const PRINCIPAL_CONFIG = {
  principalId: process.env.PRINCIPAL_ID || 'smart_layer',
  peerPrincipalId: process.env.PEER_PRINCIPAL_ID || 'manus_origin',
};

// =============================================================================
// BUDGET CONFIGURATION
// =============================================================================

/**
 * Daily token budget and admission thresholds
 *
 * Thresholds are fractions of the daily limit.
 * The budget day is the calendar date in BUDGET_TIMEZONE.
 */
export const BUDGET_CONFIG = {
  dailyLimit: parseInt(process.env.DAILY_TOKEN_LIMIT || '300000', 10),
  warningThreshold: parseFloat(process.env.WARNING_THRESHOLD || '0.8'),
  emergencyThreshold: parseFloat(process.env.EMERGENCY_THRESHOLD || '0.95'),
  maxSingleOperation: parseInt(process.env.MAX_SINGLE_OPERATION || '50000', 10),
  timeZone: process.env.BUDGET_TIMEZONE || 'UTC',
};

// =============================================================================
// COORDINATION CONFIGURATION
// =============================================================================

/**
 * Coordination trigger thresholds and polling
 */
export const COORDINATION_CONFIG = {
  stalenessWindowHours: parseFloat(process.env.STALENESS_WINDOW_HOURS || '1'),
  pollIntervalMs: parseInt(process.env.COORDINATION_POLL_INTERVAL_MS || '60000', 10),
  combinedUsageThreshold: parseFloat(process.env.COMBINED_USAGE_THRESHOLD || '0.8'),
  healthFloor: parseFloat(process.env.HEALTH_FLOOR || '0.6'),
  messageTtlHours: parseFloat(process.env.MESSAGE_TTL_HOURS || '24'),
};

/**
 * Values the HTTP service publishes in its own status heartbeat
 */
export const HEARTBEAT_CONFIG = {
  healthScore: parseFloat(process.env.HEALTH_SCORE || '0.8'),
  versionMarker: process.env.VERSION_MARKER || 'unknown',
};

// =============================================================================
// STORE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 * An empty URI runs the ledger on the local fallback log only
 */
export const MONGODB_URI = isTest
  ? process.env.MONGODB_URI || ''
  : process.env.MONGODB_URI ?? 'mongodb://localhost:27017/budget-ledger';

/**
 * MongoDB connection settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 20 : 5,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

/**
 * Ledger store settings
 * Every primary call is bounded by timeoutMs before falling back to the local log
 */
export const STORE_CONFIG = {
  timeoutMs: parseInt(process.env.STORE_TIMEOUT_MS || '5000', 10),
  fallbackDir: process.env.FALLBACK_DIR || './local_db_fallback',
};

// =============================================================================
// CACHE CONFIGURATION
// =============================================================================

/**
 * Two-tier memoization cache
 */
export const CACHE_CONFIG = {
  dir: process.env.CACHE_DIR || './.cache/budget-ledger',
  ttlMs: parseInt(process.env.CACHE_TTL_MS || '86400000', 10), // 24 hours
  maxBytes: parseInt(process.env.CACHE_MAX_BYTES || '104857600', 10), // 100 MiB
  memoryTtlMs: parseInt(process.env.CACHE_MEMORY_TTL_MS || '300000', 10), // 5 minutes
  memoryMaxEntries: parseInt(process.env.CACHE_MEMORY_MAX_ENTRIES || '1000', 10),
  sweepIntervalMs: parseInt(process.env.CACHE_SWEEP_INTERVAL_MS || '3600000', 10), // 1 hour
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API configuration
 */
export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

/**
 * Logging configuration by environment
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['MONGODB_URI', 'PRINCIPAL_ID', 'PEER_PRINCIPAL_ID'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  principal: PRINCIPAL_CONFIG.principalId,
  peer: PRINCIPAL_CONFIG.peerPrincipalId,
  mongoHost: MONGODB_URI ? MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost' : 'none', // Don't leak credentials
});
