/**
 * Budget Settings
 *
 * The validated configuration every budget component is built from.
 * Defaults come from the environment; callers (tests, embedding processes)
 * may override any group.
 */

import {
  PRINCIPAL_CONFIG,
  BUDGET_CONFIG,
  COORDINATION_CONFIG,
  STORE_CONFIG,
  CACHE_CONFIG,
} from './environments';

export interface BudgetLimits {
  dailyLimit: number;
  warningThreshold: number;
  emergencyThreshold: number;
  maxSingleOperation: number;
  timeZone: string;
}

export interface CoordinationSettings {
  stalenessWindowHours: number;
  pollIntervalMs: number;
  combinedUsageThreshold: number;
  healthFloor: number;
  messageTtlHours: number;
}

export interface StoreSettings {
  timeoutMs: number;
  fallbackDir: string;
}

export interface CacheSettings {
  dir: string;
  ttlMs: number;
  maxBytes: number;
  memoryTtlMs: number;
  memoryMaxEntries: number;
  sweepIntervalMs: number;
}

export interface BudgetSettings {
  principalId: string;
  peerPrincipalId: string;
  budget: BudgetLimits;
  coordination: CoordinationSettings;
  store: StoreSettings;
  cache: CacheSettings;
}

export interface BudgetSettingsOverrides {
  principalId?: string;
  peerPrincipalId?: string;
  budget?: Partial<BudgetLimits>;
  coordination?: Partial<CoordinationSettings>;
  store?: Partial<StoreSettings>;
  cache?: Partial<CacheSettings>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function assertNonEmpty(value: string, field: string): void {
  if (value.trim() === '') {
    throw new ConfigError(`Config field "${field}" must be a non-empty string`);
  }
}

function assertPositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Config field "${field}" must be a number greater than 0`);
  }
}

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Config field "${field}" must be an integer greater than 0`);
  }
}

function assertFraction(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`Config field "${field}" must be between 0 and 1`);
  }
}

function assertTimeZone(value: string, field: string): void {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value });
  } catch {
    throw new ConfigError(`Config field "${field}" must be a valid IANA time zone, got "${value}"`);
  }
}

/**
 * Throws ConfigError on the first value outside its allowed range
 */
export function validateBudgetSettings(settings: BudgetSettings): BudgetSettings {
  assertNonEmpty(settings.principalId, 'principalId');
  assertNonEmpty(settings.peerPrincipalId, 'peerPrincipalId');
  if (settings.principalId === settings.peerPrincipalId) {
    throw new ConfigError('Config fields "principalId" and "peerPrincipalId" must differ');
  }

  const { budget, coordination, store, cache } = settings;

  assertPositiveInteger(budget.dailyLimit, 'budget.dailyLimit');
  assertFraction(budget.warningThreshold, 'budget.warningThreshold');
  assertFraction(budget.emergencyThreshold, 'budget.emergencyThreshold');
  if (budget.warningThreshold >= budget.emergencyThreshold) {
    throw new ConfigError('Warning threshold must be less than emergency threshold');
  }
  assertPositiveInteger(budget.maxSingleOperation, 'budget.maxSingleOperation');
  assertTimeZone(budget.timeZone, 'budget.timeZone');

  assertPositive(coordination.stalenessWindowHours, 'coordination.stalenessWindowHours');
  assertPositive(coordination.pollIntervalMs, 'coordination.pollIntervalMs');
  assertFraction(coordination.combinedUsageThreshold, 'coordination.combinedUsageThreshold');
  assertFraction(coordination.healthFloor, 'coordination.healthFloor');
  if (!Number.isFinite(coordination.messageTtlHours) || coordination.messageTtlHours < 0) {
    throw new ConfigError('Config field "coordination.messageTtlHours" must be 0 or greater');
  }

  assertPositive(store.timeoutMs, 'store.timeoutMs');
  assertNonEmpty(store.fallbackDir, 'store.fallbackDir');

  assertNonEmpty(cache.dir, 'cache.dir');
  assertPositive(cache.ttlMs, 'cache.ttlMs');
  assertPositive(cache.maxBytes, 'cache.maxBytes');
  assertPositive(cache.memoryTtlMs, 'cache.memoryTtlMs');
  assertPositiveInteger(cache.memoryMaxEntries, 'cache.memoryMaxEntries');
  assertPositive(cache.sweepIntervalMs, 'cache.sweepIntervalMs');

  return settings;
}

/**
 * Build settings from the environment, apply overrides, and validate
 */
export function loadBudgetSettings(overrides: BudgetSettingsOverrides = {}): BudgetSettings {
  return validateBudgetSettings({
    principalId: overrides.principalId ?? PRINCIPAL_CONFIG.principalId,
    peerPrincipalId: overrides.peerPrincipalId ?? PRINCIPAL_CONFIG.peerPrincipalId,
    budget: { ...BUDGET_CONFIG, ...overrides.budget },
    coordination: { ...COORDINATION_CONFIG, ...overrides.coordination },
    store: { ...STORE_CONFIG, ...overrides.store },
    cache: { ...CACHE_CONFIG, ...overrides.cache },
  });
}
