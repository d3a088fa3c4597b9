import mongoose from 'mongoose';
import { Alert, InsightStatus } from '../../models/Alert';
import { Recommendation } from '../../models/Recommendation';
import logger from '../../utils/logger';
import { NotFoundError } from '../../utils/errors';
import { AlertDraft } from '../analytics/AnomalyDetector';
import { RecommendationDraft } from '../analytics/CreativeAnalysis';
import { assertTransition } from './statusTransitions';

export type InsightKind = 'alert' | 'recommendation';

const notFound = (kind: InsightKind, id: string) => new NotFoundError(`${kind} ${id} not found`);

export const saveAlerts = async (drafts: readonly AlertDraft[]): Promise<number> => {
  if (drafts.length === 0) return 0;
  const docs = await Alert.insertMany([...drafts]);
  return docs.length;
};

/**
 * Stores new recommendations, skipping any ad that already has an Active
 * recommendation of the same type.
 */
export const saveRecommendations = async (drafts: readonly RecommendationDraft[]): Promise<number> => {
  let saved = 0;
  for (const draft of drafts) {
    const existing = await Recommendation.exists({
      adId: draft.adId,
      recommendationType: draft.recommendationType,
      status: 'Active',
    });
    if (existing) continue;
    await Recommendation.create(draft);
    saved += 1;
  }
  if (saved > 0) logger.info(`Saved ${saved} new recommendations`);
  return saved;
};

export const listAlerts = async (status?: InsightStatus) =>
  Alert.find(status ? { status } : {}).sort({ alertDate: -1, createdAt: -1 }).lean();

export const listRecommendations = async (status?: InsightStatus) =>
  Recommendation.find(status ? { status } : {}).sort({ generationDate: -1, createdAt: -1 }).lean();

export const updateAlertStatus = async (id: string, next: InsightStatus) => {
  if (!mongoose.isValidObjectId(id)) throw notFound('alert', id);
  const alert = await Alert.findById(id);
  if (!alert) throw notFound('alert', id);
  assertTransition(alert.status, next);
  alert.status = next;
  await alert.save();
  return alert;
};

export const updateRecommendationStatus = async (id: string, next: InsightStatus) => {
  if (!mongoose.isValidObjectId(id)) throw notFound('recommendation', id);
  const recommendation = await Recommendation.findById(id);
  if (!recommendation) throw notFound('recommendation', id);
  assertTransition(recommendation.status, next);
  recommendation.status = next;
  await recommendation.save();
  return recommendation;
};
