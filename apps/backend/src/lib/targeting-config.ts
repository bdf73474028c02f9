import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

/**
 * Targeting document for discovery runs.
 *
 * Every numeric field falls back to its default when missing or malformed; parsing only
 * throws when the file itself cannot be read or is not JSON.
 */

export { ConfigError };

const CONFIG_DIR = path.resolve(__dirname, '../../config');

function readDefaultNicheKeywords(): string[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(CONFIG_DIR, 'niche-keywords.json'), 'utf-8'));
  return Array.isArray(raw) ? raw.filter((item): item is string => typeof item === 'string') : [];
}

const defaultNicheKeywords = readDefaultNicheKeywords();

function intSetting(fallback: number, min: number) {
  return z
    .preprocess((value) => (value === null || value === '' ? undefined : value), z.coerce.number().finite())
    .transform((value) => Math.max(min, Math.floor(value)))
    .catch(fallback);
}

function numberSetting(fallback: number, min: number) {
  return z
    .preprocess((value) => (value === null || value === '' ? undefined : value), z.coerce.number().finite())
    .transform((value) => Math.max(min, value))
    .catch(fallback);
}

function booleanSetting(fallback: boolean) {
  return z
    .preprocess(
      (value) => {
        if (typeof value !== 'string') return value;
        const raw = value.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
        if (['0', 'false', 'no', 'off'].includes(raw)) return false;
        return value;
      },
      z.boolean()
    )
    .catch(fallback);
}

function stringListSetting(fallback: readonly string[]) {
  return z
    .array(z.unknown())
    .transform((list) =>
      list
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    )
    .catch(() => [...fallback]);
}

function stringSetting(fallback: string) {
  return z
    .string()
    .transform((value) => value.trim())
    .pipe(z.string().min(1))
    .catch(fallback);
}

const RelatedExpansionSchema = z.object({
  enabled: booleanSetting(true),
  seedCount: intSetting(15, 1),
  perSeedPosts: intSetting(12, 1),
  maxConcurrency: intSetting(4, 1),
  maxTotalHandles: intSetting(300, 1),
});

const ExcludeRulesSchema = z.object({
  handleContains: stringListSetting([]).transform((list) => list.map((item) => item.toLowerCase())),
  textContains: stringListSetting([]).transform((list) => list.map((item) => item.toLowerCase())),
});

const BrandVoiceSchema = z.object({
  name: stringSetting('our brand'),
  signature: stringSetting('The team'),
  pitch: stringSetting('we make small-batch products for everyday self-care'),
});

const TargetingConfigSchema = z
  .object({
    seedHashtags: stringListSetting([]).transform((list) => list.map((tag) => tag.replace(/^#+/, '')).filter(Boolean)),
    targetNiches: stringListSetting([]),
    followerMin: intSetting(2_000, 0),
    followerMax: intSetting(80_000, 0),
    hardMaxFollowers: intSetting(250_000, 1),
    oversampleFactor: numberSetting(3, 1),
    perSeedPosts: intSetting(60, 1),
    maxTotalHandles: intSetting(500, 1),
    maxConcurrency: intSetting(6, 1),
    includeExcluded: booleanSetting(false),
    related: RelatedExpansionSchema.catch(() => RelatedExpansionSchema.parse({})),
    exclude: ExcludeRulesSchema.catch(() => ExcludeRulesSchema.parse({})),
    nicheKeywords: stringListSetting(defaultNicheKeywords).transform((list) =>
      list.map((keyword) => keyword.toLowerCase())
    ),
    brand: BrandVoiceSchema.catch(() => BrandVoiceSchema.parse({})),
  })
  .transform((config) =>
    config.followerMax < config.followerMin
      ? { ...config, followerMin: config.followerMax, followerMax: config.followerMin }
      : config
  );

export type TargetingConfig = z.infer<typeof TargetingConfigSchema>;
export type RelatedExpansionConfig = TargetingConfig['related'];
export type BrandVoice = TargetingConfig['brand'];

export function parseTargetingConfig(raw: unknown): TargetingConfig {
  const parsed = TargetingConfigSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  return TargetingConfigSchema.parse({});
}

export function resolveTargetingConfigPath(): string {
  const fromEnv = String(process.env.TARGETING_CONFIG_PATH || '').trim();
  return fromEnv ? path.resolve(fromEnv) : path.join(CONFIG_DIR, 'targeting.json');
}

export function loadTargetingConfig(filePath: string = resolveTargetingConfigPath()): TargetingConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Targeting config not readable at ${filePath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Targeting config at ${filePath} is not valid JSON`, { cause: error });
  }
  return parseTargetingConfig(raw);
}
