/**
 * Budget context
 *
 * Builds every component once, from one validated settings object, and
 * hands them out explicitly. Nothing here is a module-level singleton, so
 * tests and embedding processes can build as many isolated contexts as
 * they need.
 */

import { BudgetSettings, BudgetSettingsOverrides, loadBudgetSettings } from './config/settings';
import { FileLogBackend, LedgerStore, MongoBackend, StoreBackend } from './store';
import { AdmissionGate, BudgetService } from './services/budget';
import { CacheService } from './services/cache';
import { CoordinationService } from './services/coordination';
import { Clock, systemClock } from './utils/clock';

export interface BudgetContext {
  settings: BudgetSettings;
  clock: Clock;
  store: LedgerStore;
  budget: BudgetService;
  gate: AdmissionGate;
  coordination: CoordinationService;
  cache: CacheService;
}

export interface BudgetContextOptions {
  settings?: BudgetSettings;
  overrides?: BudgetSettingsOverrides;
  clock?: Clock;
  /**
   * Primary backend. Defaults to MongoDB when a URI is configured;
   * null runs on the local fallback only.
   */
  primary?: StoreBackend | null;
  /** Defaults to the JSON-lines log in settings.store.fallbackDir */
  fallback?: StoreBackend;
  mongoConfigured?: boolean;
}

export const createBudgetContext = (options: BudgetContextOptions = {}): BudgetContext => {
  const settings = options.settings ?? loadBudgetSettings(options.overrides);
  const clock = options.clock ?? systemClock;

  const primary =
    options.primary !== undefined
      ? options.primary
      : options.mongoConfigured
        ? new MongoBackend({ maxTimeMS: settings.store.timeoutMs })
        : null;

  const store = new LedgerStore({
    primary,
    fallback:
      options.fallback ??
      new FileLogBackend({
        directory: settings.store.fallbackDir,
        principal: settings.principalId,
        clock,
      }),
    timeoutMs: settings.store.timeoutMs,
  });

  const budget = new BudgetService({ store, settings, clock });
  const gate = new AdmissionGate(budget, settings.budget);
  const coordination = new CoordinationService({ store, budget, settings, clock });
  const cache = new CacheService(settings.cache, clock);

  return { settings, clock, store, budget, gate, coordination, cache };
};
