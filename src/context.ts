import { AppConfig } from './config/env';
import { BudgetPacer } from './services/analytics/BudgetPacer';
import { MetricsEngine } from './services/analytics/MetricsEngine';
import { AccessControl } from './services/auth/AccessControl';
import { AuthService } from './services/auth/AuthService';
import { BcryptCredentialVerifier, CredentialVerifier } from './services/auth/CredentialVerifier';
import { MongoPermissionDirectory } from './services/auth/MongoPermissionDirectory';
import { PermissionDirectory } from './services/auth/types';
import { FactStore, MongoFactStore } from './services/performance/FactStore';
import { PerformanceIngestService } from './services/performance/PerformanceIngestService';

/**
 * Everything a request handler needs, built once from the validated config.
 */
export interface AppContext {
  config: Readonly<AppConfig>;
  directory: PermissionDirectory;
  verifier: CredentialVerifier;
  accessControl: AccessControl;
  authService: AuthService;
  metrics: MetricsEngine;
  pacer: BudgetPacer;
  ingest: PerformanceIngestService;
}

export interface ContextOverrides {
  directory?: PermissionDirectory;
  verifier?: CredentialVerifier;
  factStore?: FactStore;
}

export const createContext = (
  config: Readonly<AppConfig>,
  overrides: ContextOverrides = {}
): AppContext => {
  const directory = overrides.directory ?? new MongoPermissionDirectory();
  const verifier = overrides.verifier ?? new BcryptCredentialVerifier();

  return {
    config,
    directory,
    verifier,
    accessControl: new AccessControl(directory, config.analytics.superAdminRole),
    authService: new AuthService(directory, verifier),
    metrics: new MetricsEngine(config.analytics),
    pacer: new BudgetPacer(config.analytics.budgetTolerance),
    ingest: new PerformanceIngestService(overrides.factStore ?? new MongoFactStore()),
  };
};
