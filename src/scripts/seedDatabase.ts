/**
 * Loads the sample campaigns, performance rows, customers and roles from
 * data/seed.json and creates an admin user. Safe to run repeatedly: every
 * record is upserted on its business key.
 *
 * Usage: SEED_ADMIN_PASSWORD=... npm run seed
 */

import fs from 'fs';
import path from 'path';
import mongoose from 'mongoose';
import { loadConfigFromDotenv } from '../config/env';
import { ABTest } from '../models/ABTest';
import { Ad } from '../models/Ad';
import { AdSet } from '../models/AdSet';
import { Campaign } from '../models/Campaign';
import { CampaignBudget } from '../models/CampaignBudget';
import { Customer } from '../models/Customer';
import { DailyPerformance } from '../models/DailyPerformance';
import { PerformanceByCountry } from '../models/PerformanceByCountry';
import { PerformanceBySegment } from '../models/PerformanceBySegment';
import { Role } from '../models/Role';
import { PAGES, PageName, RolePermission } from '../models/RolePermission';
import { Sale } from '../models/Sale';
import { User } from '../models/User';
import { BcryptCredentialVerifier } from '../services/auth/CredentialVerifier';
import { connectDatabase, disconnectDatabase } from '../utils/database';
import { ConfigurationError, errorMessage } from '../utils/errors';
import logger, { setLogLevel } from '../utils/logger';

type SeedRecord = Record<string, unknown>;

interface SeedRole {
  name: string;
  pages: PageName[];
}

interface SeedData {
  campaigns: SeedRecord[];
  adSets: SeedRecord[];
  ads: SeedRecord[];
  abTests: SeedRecord[];
  budgets: SeedRecord[];
  dailyPerformance: SeedRecord[];
  segmentPerformance: SeedRecord[];
  countryPerformance: SeedRecord[];
  customers: SeedRecord[];
  sales: SeedRecord[];
  roles: SeedRole[];
}

const SEED_FILE = path.join(__dirname, '../../data/seed.json');

const RECORD_KEYS = [
  'campaigns',
  'adSets',
  'ads',
  'abTests',
  'budgets',
  'dailyPerformance',
  'segmentPerformance',
  'countryPerformance',
  'customers',
  'sales',
] as const;

const isRecord = (value: unknown): value is SeedRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isRecordList = (value: unknown): value is SeedRecord[] =>
  Array.isArray(value) && value.every(isRecord);

const isSeedRole = (value: unknown): value is SeedRole =>
  isRecord(value) &&
  typeof value.name === 'string' &&
  Array.isArray(value.pages) &&
  value.pages.every((page) => PAGES.some((known) => known === page));

const isSeedData = (value: unknown): value is SeedData =>
  isRecord(value) &&
  RECORD_KEYS.every((key) => isRecordList(value[key])) &&
  Array.isArray(value.roles) &&
  value.roles.every(isSeedRole);

const readSeedFile = (file: string): SeedData => {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (!isSeedData(parsed)) {
    throw new Error(`${file} does not have the expected shape`);
  }
  return parsed;
};

type Upsert = (record: SeedRecord) => Promise<unknown>;

/** Upserts each record on its business key and returns how many were seeded. */
const upsertAll = async (records: SeedRecord[], upsert: Upsert): Promise<number> => {
  for (const record of records) {
    await upsert(record);
  }
  return records.length;
};

async function seedRoles(roles: SeedRole[]): Promise<void> {
  for (const seed of roles) {
    const role = await Role.findOneAndUpdate(
      { name: seed.name },
      { $set: { name: seed.name } },
      { upsert: true, new: true }
    );
    if (!role) {
      throw new Error(`Role ${seed.name} could not be upserted`);
    }
    await RolePermission.deleteMany({ roleId: role._id });
    await RolePermission.insertMany(seed.pages.map((pageName) => ({ roleId: role._id, pageName })));
    logger.info(`Role ${seed.name}: ${seed.pages.length} pages`);
  }
}

async function seedAdmin(roleName: string): Promise<void> {
  const password = process.env.SEED_ADMIN_PASSWORD?.trim();
  if (!password) {
    throw new ConfigurationError(['SEED_ADMIN_PASSWORD is required to create the admin user']);
  }
  const username = (process.env.SEED_ADMIN_USERNAME?.trim() || 'admin').toLowerCase();

  const role = await Role.findOne({ name: roleName });
  if (!role) {
    throw new Error(`Role ${roleName} was not seeded`);
  }

  const passwordHash = await new BcryptCredentialVerifier().hash(password);
  await User.findOneAndUpdate(
    { username },
    { $set: { username, name: 'Administrator', passwordHash, roleId: role._id } },
    { upsert: true }
  );
  logger.info(`Admin user ${username} ready with role ${roleName}`);
}

async function seedDatabase() {
  try {
    const config = loadConfigFromDotenv();
    setLogLevel(config.logLevel);

    const data = readSeedFile(SEED_FILE);
    await connectDatabase(config.mongoUri);

    const counts = {
      campaigns: await upsertAll(data.campaigns, (r) =>
        Campaign.updateOne({ campaignId: r.campaignId }, { $set: r }, { upsert: true }).exec()
      ),
      adSets: await upsertAll(data.adSets, (r) =>
        AdSet.updateOne({ adSetId: r.adSetId }, { $set: r }, { upsert: true }).exec()
      ),
      ads: await upsertAll(data.ads, (r) =>
        Ad.updateOne({ adId: r.adId }, { $set: r }, { upsert: true }).exec()
      ),
      abTests: await upsertAll(data.abTests, (r) =>
        ABTest.updateOne({ testId: r.testId }, { $set: r }, { upsert: true }).exec()
      ),
      budgets: await upsertAll(data.budgets, (r) =>
        CampaignBudget.updateOne({ campaignId: r.campaignId }, { $set: r }, { upsert: true }).exec()
      ),
      dailyPerformance: await upsertAll(data.dailyPerformance, (r) =>
        DailyPerformance.updateOne(
          { date: r.date, adId: r.adId },
          { $set: r },
          { upsert: true }
        ).exec()
      ),
      segmentPerformance: await upsertAll(data.segmentPerformance, (r) =>
        PerformanceBySegment.updateOne(
          { date: r.date, adId: r.adId, segmentType: r.segmentType, segmentValue: r.segmentValue },
          { $set: r },
          { upsert: true }
        ).exec()
      ),
      countryPerformance: await upsertAll(data.countryPerformance, (r) =>
        PerformanceByCountry.updateOne(
          { date: r.date, platform: r.platform, country: r.country },
          { $set: r },
          { upsert: true }
        ).exec()
      ),
      customers: await upsertAll(data.customers, (r) =>
        Customer.updateOne({ customerId: r.customerId }, { $set: r }, { upsert: true }).exec()
      ),
      sales: await upsertAll(data.sales, (r) =>
        Sale.updateOne({ saleId: r.saleId }, { $set: r }, { upsert: true }).exec()
      ),
    };

    for (const [collection, count] of Object.entries(counts)) {
      logger.info(`Seeded ${collection}: ${count}`);
    }

    await seedRoles(data.roles);
    await seedAdmin(config.analytics.superAdminRole);

    logger.info('Seeding complete');
  } catch (error) {
    logger.error(`Seeding failed: ${errorMessage(error)}`, error);
    process.exitCode = 1;
  } finally {
    if (mongoose.connection.readyState !== 0) {
      await disconnectDatabase();
    }
  }
}

void seedDatabase();
