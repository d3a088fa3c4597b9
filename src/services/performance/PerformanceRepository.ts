import { FilterQuery } from 'mongoose';
import { Ad } from '../../models/Ad';
import { Campaign, ICampaign } from '../../models/Campaign';
import { DailyPerformance, IDailyPerformance } from '../../models/DailyPerformance';
import { IPerformanceByCountry, PerformanceByCountry } from '../../models/PerformanceByCountry';
import { PerformanceBySegment } from '../../models/PerformanceBySegment';
import { Sale } from '../../models/Sale';
import { CampaignBudget } from '../../models/CampaignBudget';
import { DateRange, PerformanceFilter } from '../../utils/dateRange';
import { PerformanceFact } from '../analytics/types';
import { CountryFact, SegmentFact } from '../analytics/Benchmarking';
import { CreativeInfo } from '../analytics/CreativeAnalysis';
import { VariantCounts } from '../analytics/SignificanceTester';
import { DailySpendRow } from '../analytics/AnomalyDetector';
import { SaleRow } from '../analytics/RfmSegmentation';
import { BudgetWindow } from '../analytics/BudgetPacer';

interface DailyDoc {
  date: string;
  adId: string;
  campaignId: string;
  impressions: number;
  reach: number;
  frequency: number;
  clicks: number;
  spend: number;
  videoViews: number;
  addToCarts: number;
  conversions: number;
  revenue: number;
}

const toFact = (doc: DailyDoc, platform?: string): PerformanceFact => ({
  date: doc.date,
  adId: doc.adId,
  campaignId: doc.campaignId,
  platform,
  impressions: doc.impressions,
  reach: doc.reach,
  frequency: doc.frequency,
  clicks: doc.clicks,
  spend: doc.spend,
  videoViews: doc.videoViews,
  addToCarts: doc.addToCarts,
  conversions: doc.conversions,
  revenue: doc.revenue,
});

/**
 * Loads daily fact rows for the date range, restricted to campaigns on the
 * given platforms and/or with the given ids. Each row carries its
 * campaign's platform.
 */
export const loadDailyFacts = async (filter: PerformanceFilter): Promise<PerformanceFact[]> => {
  const campaignQuery: FilterQuery<ICampaign> = {};
  if (filter.platforms.length > 0) campaignQuery.platform = { $in: filter.platforms };
  if (filter.campaignIds.length > 0) campaignQuery.campaignId = { $in: filter.campaignIds };

  const campaigns = await Campaign.find(campaignQuery).select('campaignId platform').lean();
  if (campaigns.length === 0) return [];

  const platformByCampaign = new Map(campaigns.map((c) => [c.campaignId, c.platform]));

  const docs = await DailyPerformance.find({
    date: { $gte: filter.since, $lte: filter.until },
    campaignId: { $in: [...platformByCampaign.keys()] },
  })
    .sort({ date: 1, adId: 1 })
    .lean<DailyDoc[]>();

  return docs.map((doc) => toFact(doc, platformByCampaign.get(doc.campaignId)));
};

export const loadSegmentFacts = async (
  range: DateRange,
  platform: string,
  segmentType: string
): Promise<SegmentFact[]> => {
  const campaigns = await Campaign.find({ platform }).select('campaignId').lean();
  const campaignIds = campaigns.map((c) => c.campaignId);
  if (campaignIds.length === 0) return [];

  return PerformanceBySegment.find({
    date: { $gte: range.since, $lte: range.until },
    campaignId: { $in: campaignIds },
    segmentType,
  })
    .select('segmentType segmentValue impressions clicks spend conversions revenue')
    .lean<SegmentFact[]>();
};

export const loadCountryFacts = async (
  range: DateRange,
  countries: string[],
  platforms: string[]
): Promise<CountryFact[]> => {
  const query: FilterQuery<IPerformanceByCountry> = { date: { $gte: range.since, $lte: range.until } };
  if (countries.length > 0) query.country = { $in: countries };
  if (platforms.length > 0) query.platform = { $in: platforms };

  return PerformanceByCountry.find(query)
    .select('platform country impressions clicks spend conversions revenue')
    .lean<CountryFact[]>();
};

export const loadCreativeInfo = async (adIds: string[]): Promise<CreativeInfo[]> => {
  const ads = await Ad.find({ adId: { $in: adIds } })
    .select('adId name creativeType headline')
    .lean();
  return ads.map((ad) => ({
    adId: ad.adId,
    name: ad.name,
    creativeType: ad.creativeType,
    headline: ad.headline,
  }));
};

/** Summed impressions/clicks/conversions for every ad in an A/B test. */
export const loadVariantCounts = async (
  testId: string,
  range?: DateRange
): Promise<VariantCounts[]> => {
  const ads = await Ad.find({ testId }).select('adId name').lean();
  if (ads.length === 0) return [];

  const match: FilterQuery<IDailyPerformance> = { adId: { $in: ads.map((ad) => ad.adId) } };
  if (range) match.date = { $gte: range.since, $lte: range.until };

  const totals = await DailyPerformance.aggregate<{
    _id: string;
    impressions: number;
    clicks: number;
    conversions: number;
  }>([
    { $match: match },
    {
      $group: {
        _id: '$adId',
        impressions: { $sum: '$impressions' },
        clicks: { $sum: '$clicks' },
        conversions: { $sum: '$conversions' },
      },
    },
  ]);

  const totalsByAd = new Map(totals.map((t) => [t._id, t]));
  return ads.map((ad) => {
    const t = totalsByAd.get(ad.adId);
    return {
      adId: ad.adId,
      name: ad.name,
      impressions: t?.impressions ?? 0,
      clicks: t?.clicks ?? 0,
      conversions: t?.conversions ?? 0,
    };
  });
};

/** Cumulative spend for each campaign up to and including `until`. */
export const loadSpendToDate = async (
  campaignIds: string[],
  until: string
): Promise<Map<string, number>> => {
  const totals = await DailyPerformance.aggregate<{ _id: string; spend: number }>([
    { $match: { campaignId: { $in: campaignIds }, date: { $lte: until } } },
    { $group: { _id: '$campaignId', spend: { $sum: '$spend' } } },
  ]);
  return new Map(totals.map((t) => [t._id, t.spend]));
};

export const loadBudgets = async (campaignId?: string): Promise<BudgetWindow[]> => {
  const budgets = await CampaignBudget.find(campaignId ? { campaignId } : {})
    .sort({ campaignId: 1 })
    .lean();
  return budgets.map((b) => ({
    campaignId: b.campaignId,
    startDate: b.startDate,
    endDate: b.endDate,
    totalBudget: b.totalBudget,
  }));
};

export const loadDailySpendSince = async (since: string): Promise<DailySpendRow[]> =>
  DailyPerformance.find({ date: { $gte: since } })
    .select('date adId spend conversions')
    .sort({ date: 1 })
    .lean<DailySpendRow[]>();

export const loadSales = async (): Promise<SaleRow[]> =>
  Sale.find().select('customerId saleDate saleAmount').lean<SaleRow[]>();
