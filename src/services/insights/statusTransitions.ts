import { INSIGHT_STATUSES, InsightStatus } from '../../models/Alert';
import { InvalidTransitionError, ValidationError } from '../../utils/errors';

// Alerts and recommendations only ever leave the Active state
const ALLOWED: Record<InsightStatus, readonly InsightStatus[]> = {
  Active: ['Dismissed', 'Resolved'],
  Dismissed: [],
  Resolved: [],
};

export const isInsightStatus = (value: unknown): value is InsightStatus =>
  typeof value === 'string' && INSIGHT_STATUSES.some((status) => status === value);

export const parseInsightStatus = (value: unknown): InsightStatus => {
  if (!isInsightStatus(value)) {
    throw new ValidationError(`status must be one of ${INSIGHT_STATUSES.join(', ')}`);
  }
  return value;
};

export const canTransition = (from: InsightStatus, to: InsightStatus): boolean =>
  ALLOWED[from].includes(to);

export const assertTransition = (from: InsightStatus, to: InsightStatus): void => {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
};
