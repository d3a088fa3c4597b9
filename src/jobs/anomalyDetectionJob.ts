import * as cron from 'node-cron';
import { AppConfig } from '../config/env';
import {
  AlertDraft,
  anomalyWindowStart,
  DailySpendRow,
  detectCpaAnomalies,
} from '../services/analytics/AnomalyDetector';
import { saveAlerts } from '../services/insights/InsightService';
import { loadDailySpendSince } from '../services/performance/PerformanceRepository';
import { formatDate } from '../utils/dateRange';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface AnomalyJobDeps {
  loadRows: (since: string) => Promise<DailySpendRow[]>;
  saveAlerts: (drafts: readonly AlertDraft[]) => Promise<number>;
}

const mongoDeps: AnomalyJobDeps = {
  loadRows: loadDailySpendSince,
  saveAlerts,
};

export const runAnomalyDetection = async (
  today: string,
  deps: AnomalyJobDeps = mongoDeps
): Promise<AlertDraft[]> => {
  const rows = await deps.loadRows(anomalyWindowStart(today));
  const alerts = detectCpaAnomalies(rows, today);
  const saved = await deps.saveAlerts(alerts);
  logger.info(`Anomaly detection for ${today}: ${alerts.length} CPA spikes, ${saved} alerts stored`);
  return alerts;
};

export const startAnomalyDetectionJob = (config: Readonly<AppConfig>): cron.ScheduledTask | null => {
  if (!config.features.anomalyDetection) {
    logger.info('Anomaly detection job disabled');
    return null;
  }

  logger.info(`Anomaly detection job scheduled (${config.anomalyCron})`);
  return cron.schedule(config.anomalyCron, async () => {
    try {
      await runAnomalyDetection(formatDate(new Date()));
    } catch (error) {
      logger.error(`Anomaly detection failed: ${errorMessage(error)}`, error);
    }
  });
};
