import { Response } from 'express';
import { AppContext } from '../context';
import { AuthRequest } from '../middleware/auth';
import { benchmarkCountries, breakdownBySegment, BENCHMARKS } from '../services/analytics/Benchmarking';
import { analyzeCreatives, generateRecommendations } from '../services/analytics/CreativeAnalysis';
import { calculateRfm } from '../services/analytics/RfmSegmentation';
import { saveRecommendations } from '../services/insights/InsightService';
import {
  loadCountryFacts,
  loadCreativeInfo,
  loadDailyFacts,
  loadSales,
  loadSegmentFacts,
} from '../services/performance/PerformanceRepository';
import { formatDate, parseDateRange, parseList, parsePerformanceFilter } from '../utils/dateRange';
import { sendError, queryString } from '../utils/http';

export const createAnalyticsController = (ctx: AppContext) => {
  const { metrics } = ctx;

  // Overall totals plus breakdowns for the dashboard charts
  const getSummary = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const filter = parsePerformanceFilter(req.query);
      const rows = await loadDailyFacts(filter);

      res.json({
        filter,
        targets: {
          roas: ctx.config.analytics.roasTarget,
          cpa: ctx.config.analytics.cpaTarget,
          ctr: ctx.config.analytics.ctrTarget,
        },
        hasData: rows.length > 0,
        overall: metrics.summarize(rows),
        campaigns: metrics.byCampaign(rows),
        platforms: metrics.byPlatform(rows),
        daily: metrics.byDate(rows),
      });
    } catch (error) {
      sendError(res, error, 'Get summary error', 'Failed to compute metrics');
    }
  };

  const getAdMetrics = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const filter = parsePerformanceFilter(req.query);
      const rows = await loadDailyFacts(filter);
      res.json({ filter, ads: metrics.byAd(rows) });
    } catch (error) {
      sendError(res, error, 'Get ad metrics error', 'Failed to compute ad metrics');
    }
  };

  const getCreatives = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const filter = parsePerformanceFilter(req.query);
      const rows = await loadDailyFacts(filter);
      const ads = await loadCreativeInfo([...new Set(rows.map((row) => row.adId))]);
      res.json({ filter, creatives: analyzeCreatives(metrics, rows, ads) });
    } catch (error) {
      sendError(res, error, 'Get creatives error', 'Failed to analyze creatives');
    }
  };

  const createRecommendations = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      if (!ctx.config.features.autoRecommendations) {
        res.status(404).json({ error: 'Recommendations are disabled' });
        return;
      }

      const filter = parsePerformanceFilter(req.query);
      const rows = await loadDailyFacts(filter);
      const ads = await loadCreativeInfo([...new Set(rows.map((row) => row.adId))]);
      const drafts = generateRecommendations(
        analyzeCreatives(metrics, rows, ads),
        ctx.config.analytics.cpaTarget,
        formatDate(new Date())
      );
      const saved = await saveRecommendations(drafts);

      res.status(201).json({ generated: drafts.length, saved, recommendations: drafts });
    } catch (error) {
      sendError(res, error, 'Generate recommendations error', 'Failed to generate recommendations');
    }
  };

  const getSegments = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const range = parseDateRange(req.query);
      const platform = queryString(req.query.platform);
      const segmentType = queryString(req.query.segmentType);
      if (!platform || !segmentType) {
        res.status(400).json({ error: 'platform and segmentType are required' });
        return;
      }

      const rows = await loadSegmentFacts(range, platform, segmentType);
      res.json({ ...range, platform, segmentType, segments: breakdownBySegment(metrics, rows) });
    } catch (error) {
      sendError(res, error, 'Get segments error', 'Failed to compute segment breakdown');
    }
  };

  const getCountries = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const range = parseDateRange(req.query);
      const rows = await loadCountryFacts(
        range,
        parseList(req.query.countries),
        parseList(req.query.platforms)
      );
      res.json({ ...range, benchmarks: BENCHMARKS, countries: benchmarkCountries(metrics, rows) });
    } catch (error) {
      sendError(res, error, 'Get countries error', 'Failed to compute country benchmarks');
    }
  };

  const getRfm = async (_req: AuthRequest, res: Response): Promise<void> => {
    try {
      const customers = calculateRfm(await loadSales());
      const segments: Record<string, number> = {};
      for (const customer of customers) {
        segments[customer.segment] = (segments[customer.segment] ?? 0) + 1;
      }
      res.json({ customers, segments });
    } catch (error) {
      sendError(res, error, 'Get RFM error', 'Failed to segment customers');
    }
  };

  return {
    getSummary,
    getAdMetrics,
    getCreatives,
    createRecommendations,
    getSegments,
    getCountries,
    getRfm,
  };
};
