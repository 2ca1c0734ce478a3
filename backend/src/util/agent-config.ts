import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { isEvenCronCadence } from './cron.js';

const weight = z.number().min(0).max(1);
const hours = z.number().positive();

const scoringWeightsSchema = z
  .object({
    rsi: weight.default(0.15),
    emaCrossover: weight.default(0.2),
    emaPricePosition: weight.default(0.2),
    bollingerBands: weight.default(0.1),
    volumeSpike: weight.default(0.1),
    fearGreed: weight.default(0.1),
    publicInterest: weight.default(0.05),
    referenceAthProximity: weight.default(0.05),
    dominance: weight.default(0.05),
  })
  .strict()
  .default({});

const priceTargetsSchema = z
  .object({
    buy: z.number().positive().nullish(),
    sell: z.number().positive().nullish(),
  })
  .strict();

const profitTargetSchema = z
  .object({
    targetPrice: z.number().positive(),
    sellPercentage: z.number().gt(0).max(100),
  })
  .strict();

const trailingStopSchema = z
  .object({
    percentDropFromAth: z.number().gt(0).max(100).nullish(),
    closeBelowEma50: z.boolean().default(false),
  })
  .strict();

const holdingSchema = z.object({ quantity: z.number().min(0) }).strict();

const summaryTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM (24h, UTC)');

export const agentConfigSchema = z
  .object({
    trackedAssets: z.array(z.string().min(1)).min(1),
    referenceAssets: z
      .array(z.string().min(1))
      .default(['bitcoin', 'ethereum']),
    publicInterestKeywords: z.record(z.string().min(1)).default({}),
    runEveryHours: z
      .number()
      .int()
      .min(1)
      .max(24)
      .refine((h) => 24 % h === 0, 'must divide 24 (1, 2, 3, 4, 6, 8, 12 or 24)')
      .default(6),
    priceCheckIntervalSeconds: z
      .number()
      .int()
      .min(1)
      .refine(
        isEvenCronCadence,
        'must divide a minute, an hour in whole minutes, or a day in whole hours',
      )
      .default(60),
    historyLookbackDays: z.number().int().min(30).default(250),
    alertScoreThreshold: z.number().min(0).max(100).default(80),
    scoringWeights: scoringWeightsSchema,
    volumeSpikeMultiplier: z.number().positive().default(1.5),
    volumeFallbackThreshold: z.number().positive().default(1_000_000_000),
    priceAlerts: z.record(priceTargetsSchema).default({}),
    profitTakingAlerts: z.record(z.array(profitTargetSchema)).default({}),
    trailingStopAlerts: z.record(trailingStopSchema).default({}),
    portfolioHoldings: z.record(holdingSchema).default({}),
    portfolioAlertThresholds: z
      .object({
        totalPortfolioPercentChange: z.number().positive().nullish(),
        individualAssetPercentChange: z.number().positive().nullish(),
      })
      .strict()
      .default({}),
    summaryReportTime: summaryTimeSchema.nullable().default('22:00'),
    cooldownHours: z
      .object({
        signal: hours.default(6),
        price: hours.default(6),
        portfolio: hours.default(12),
        profitTaking: hours.default(24),
        trailingStop: hours.default(48),
      })
      .strict()
      .default({}),
  })
  .strict();

export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type ScoringWeights = AgentConfig['scoringWeights'];
export type PriceTargets = z.infer<typeof priceTargetsSchema>;
export type ProfitTarget = z.infer<typeof profitTargetSchema>;
export type TrailingStopSettings = z.infer<typeof trailingStopSchema>;
export type CooldownHours = AgentConfig['cooldownHours'];

export function parseAgentConfig(raw: unknown): AgentConfig {
  const result = agentConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ');
    throw new Error(`invalid agent config: ${issues}`);
  }
  return result.data;
}

export function loadAgentConfig(configPath: string): AgentConfig {
  const resolved = path.resolve(configPath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read agent config ${resolved}: ${reason}`);
  }
  return parseAgentConfig(raw);
}

/** Search term used for an asset's public-interest lookup. */
export function publicInterestKeyword(
  config: AgentConfig,
  assetId: string,
): string {
  return (
    config.publicInterestKeywords[assetId] ??
    `${assetId.replace(/-/g, ' ')} coin`
  );
}
