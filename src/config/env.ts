import dotenv from 'dotenv';
import * as cron from 'node-cron';
import { ConfigurationError } from '../utils/errors';

export interface AnalyticsConfig {
  roasTarget: number;
  cpaTarget: number;
  /** CTR target in percent (1.8 means 1.8%). */
  ctrTarget: number;
  /** Allowed deviation of the pacing ratio from 1 before a budget is flagged. */
  budgetTolerance: number;
  /** Two-sided confidence level used by the A/B significance tester. */
  abConfidenceLevel: number;
  /** Role that may view every page regardless of its permission rows. */
  superAdminRole: string;
}

export interface FeatureFlags {
  anomalyDetection: boolean;
  autoRecommendations: boolean;
}

export interface AppConfig {
  port: number;
  mongoUri: string;
  jwtSecret: string;
  jwtExpiresIn: string;
  logLevel: string;
  anomalyCron: string;
  analytics: AnalyticsConfig;
  features: FeatureFlags;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_ANALYTICS: Readonly<AnalyticsConfig> = Object.freeze({
  roasTarget: 2.5,
  cpaTarget: 35.0,
  ctrTarget: 1.8,
  budgetTolerance: 0.1,
  abConfidenceLevel: 0.95,
  superAdminRole: 'Admin',
});

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Reads a numeric setting. Blank or absent values fall back to the default;
 * anything that is not a finite number inside the range is reported.
 */
const readNumber = (
  env: Env,
  key: string,
  fallback: number,
  issues: string[],
  range: { min?: number; max?: number; exclusiveMin?: boolean } = {}
): number => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    issues.push(`${key} must be a number (got "${raw}")`);
    return fallback;
  }
  if (range.min !== undefined) {
    const tooLow = range.exclusiveMin ? value <= range.min : value < range.min;
    if (tooLow) {
      issues.push(`${key} must be ${range.exclusiveMin ? 'greater than' : 'at least'} ${range.min}`);
    }
  }
  if (range.max !== undefined && value > range.max) {
    issues.push(`${key} must be at most ${range.max}`);
  }
  return value;
};

const readFlag = (env: Env, key: string, fallback: boolean, issues: string[]): boolean => {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  issues.push(`${key} must be true or false (got "${raw}")`);
  return fallback;
};

const readRequired = (env: Env, key: string, issues: string[]): string => {
  const value = env[key]?.trim();
  if (!value) {
    issues.push(`${key} environment variable is not set`);
    return '';
  }
  return value;
};

/**
 * Builds the immutable application config from environment variables.
 * Every problem is collected and reported at once as a ConfigurationError.
 */
export const loadConfig = (env: Env = process.env): Readonly<AppConfig> => {
  const issues: string[] = [];

  const mongoUri = readRequired(env, 'MONGO_URI', issues);
  const jwtSecret = readRequired(env, 'JWT_SECRET', issues);

  const port = readNumber(env, 'PORT', 3001, issues, { min: 1, max: 65535 });
  const logLevel = env.LOG_LEVEL?.trim() || 'info';
  if (!LOG_LEVELS.includes(logLevel)) {
    issues.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  const analytics: AnalyticsConfig = {
    roasTarget: readNumber(env, 'ROAS_TARGET', DEFAULT_ANALYTICS.roasTarget, issues, {
      min: 0,
      exclusiveMin: true,
    }),
    cpaTarget: readNumber(env, 'CPA_TARGET', DEFAULT_ANALYTICS.cpaTarget, issues, {
      min: 0,
      exclusiveMin: true,
    }),
    ctrTarget: readNumber(env, 'CTR_TARGET', DEFAULT_ANALYTICS.ctrTarget, issues, {
      min: 0,
      exclusiveMin: true,
      max: 100,
    }),
    budgetTolerance: readNumber(env, 'BUDGET_TOLERANCE', DEFAULT_ANALYTICS.budgetTolerance, issues, {
      min: 0,
      max: 1,
    }),
    abConfidenceLevel: readNumber(
      env,
      'AB_CONFIDENCE_LEVEL',
      DEFAULT_ANALYTICS.abConfidenceLevel,
      issues,
      { min: 0.5, max: 0.9999 }
    ),
    superAdminRole: env.SUPER_ADMIN_ROLE?.trim() || DEFAULT_ANALYTICS.superAdminRole,
  };

  const features: FeatureFlags = {
    anomalyDetection: readFlag(env, 'ENABLE_ANOMALY_DETECTION', true, issues),
    autoRecommendations: readFlag(env, 'ENABLE_AUTO_RECOMMENDATIONS', true, issues),
  };

  const anomalyCron = env.ANOMALY_CRON?.trim() || '0 6 * * *';
  if (!cron.validate(anomalyCron)) {
    issues.push(`ANOMALY_CRON is not a valid cron expression (got "${anomalyCron}")`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return Object.freeze({
    port,
    mongoUri,
    jwtSecret,
    jwtExpiresIn: env.JWT_EXPIRES_IN?.trim() || '7d',
    logLevel,
    anomalyCron,
    analytics: Object.freeze(analytics),
    features: Object.freeze(features),
  });
};

/**
 * Loads `.env` into process.env, then validates it.
 */
export const loadConfigFromDotenv = (): Readonly<AppConfig> => {
  dotenv.config();
  return loadConfig(process.env);
};
