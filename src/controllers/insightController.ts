import { Response } from 'express';
import { AuthRequest } from '../middleware/auth';
import {
  listAlerts,
  listRecommendations,
  updateAlertStatus,
  updateRecommendationStatus,
} from '../services/insights/InsightService';
import { parseInsightStatus } from '../services/insights/statusTransitions';
import { sendError } from '../utils/http';

const statusFilter = (value: unknown) => (value === undefined ? undefined : parseInsightStatus(value));

export const getAlerts = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const alerts = await listAlerts(statusFilter(req.query.status));
    res.json({ alerts });
  } catch (error) {
    sendError(res, error, 'Get alerts error', 'Failed to fetch alerts');
  }
};

export const patchAlert = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const alert = await updateAlertStatus(req.params.id, parseInsightStatus(req.body?.status));
    res.json(alert);
  } catch (error) {
    sendError(res, error, 'Update alert error', 'Failed to update alert');
  }
};

export const getRecommendations = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const recommendations = await listRecommendations(statusFilter(req.query.status));
    res.json({ recommendations });
  } catch (error) {
    sendError(res, error, 'Get recommendations error', 'Failed to fetch recommendations');
  }
};

export const patchRecommendation = async (req: AuthRequest, res: Response): Promise<void> => {
  try {
    const recommendation = await updateRecommendationStatus(
      req.params.id,
      parseInsightStatus(req.body?.status)
    );
    res.json(recommendation);
  } catch (error) {
    sendError(res, error, 'Update recommendation error', 'Failed to update recommendation');
  }
};
