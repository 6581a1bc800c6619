/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a value is malformed.
 * Every knob has a default, so an empty environment is a valid one.
 */
import { z } from 'zod';
import type { AssetType, CollectorConfig, RegionBounds } from '../types.ts';

const TRUE_VALUES = ['true', '1', 'yes'];

/** Boolean flag read from a string env var. z.coerce.boolean() treats "false" as true. */
const flag = (fallback: boolean) =>
  z.enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((v) => (v === undefined ? fallback : TRUE_VALUES.includes(v)));

const boundsSchema = z.string().default('33.0,39.5,124.0,132.1').transform((raw, ctx): RegionBounds => {
  const parts = raw.split(',').map((s) => Number(s.trim()));
  const [latMin, latMax, lonMin, lonMax] = parts;
  if (
    parts.length !== 4 ||
    latMin === undefined || latMax === undefined || lonMin === undefined || lonMax === undefined ||
    !parts.every(Number.isFinite)
  ) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected "latMin,latMax,lonMin,lonMax"' });
    return z.NEVER;
  }
  if (latMin >= latMax || lonMin >= lonMax) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minimum must be below maximum on both axes' });
    return z.NEVER;
  }
  return { latMin, latMax, lonMin, lonMax };
});

const assetTypesSchema = z.string().default('APT:VL').transform((raw, ctx): AssetType[] => {
  const wanted = new Set(raw.split(':').map((s) => s.trim().toUpperCase()).filter(Boolean));
  const types: AssetType[] = [];
  // APT first, then VL, whatever order the variable lists them in
  if (wanted.has('APT')) types.push('APT');
  if (wanted.has('VL')) types.push('VL');
  if (types.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected APT, VL or APT:VL' });
    return z.NEVER;
  }
  return types;
});

const envSchema = z.object({
  // ── Runtime ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // ── Geography ──
  REGION_BOUNDS: boundsSchema,
  ZOOM_MIN: z.coerce.number().int().min(1).max(21).default(15),
  ZOOM_MAX: z.coerce.number().int().min(1).max(21).default(17),
  ASSET_TYPES: assetTypesSchema,

  // ── Grid sweep ──
  GRID_RINGS: z.coerce.number().int().min(0).max(5).default(1),
  GRID_STEP_PX: z.coerce.number().int().min(50).max(2000).default(480),
  SWEEP_DWELL_MS: z.coerce.number().int().min(0).default(600),

  // ── Work caps ──
  MAX_COMPLEX_DETAIL: z.coerce.number().int().min(0).default(800),
  MAX_ARTICLE_DETAIL: z.coerce.number().int().min(0).default(10_000),   // 0 = no cap
  MIN_LISTING_COUNT: z.coerce.number().int().min(0).default(2),
  PRIORITIZE_BY_COUNT: flag(false),

  // ── Detail phase ──
  USE_MOBILE_DETAIL: flag(true),
  DETAIL_WORKERS: z.coerce.number().int().min(1).max(32).default(12),
  ONLY_WITH_PREV_LEASE: flag(true),
  ONLY_PREV_GTE_SALE: flag(true),
  BLOCK_HEAVY_RESOURCES: flag(true),
  RESPONSE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(20_000),

  // ── Browser ──
  HEADLESS: flag(false),
  BROWSER_CHANNEL: z.string().min(1).optional(),
  BROWSER_EXECUTABLE: z.string().min(1).optional(),

  // ── Output ──
  OUTPUT_LOCALE: z.enum(['ko', 'en']).default('ko'),
  OUTPUT_DIR: z.string().min(1).default('.'),
  METRICS_FILE: z.string().min(1).optional(),
}).superRefine((v, ctx) => {
  if (v.ZOOM_MIN > v.ZOOM_MAX) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ZOOM_MIN'], message: 'ZOOM_MIN must not exceed ZOOM_MAX' });
  }
});

export type Env = z.infer<typeof envSchema>;

/** Validate an environment map without side effects. */
export function parseEnv(raw: Record<string, string | undefined>) {
  // Blank values behave like unset ones
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  return envSchema.safeParse(cleaned);
}

/**
 * Parse and validate environment.
 * Exits the process when a variable is malformed.
 */
function loadEnv(): Env {
  const result = parseEnv(process.env);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();

/** Map validated env vars onto the collector's option object. */
export function toCollectorConfig(e: Env): CollectorConfig {
  return {
    bounds: e.REGION_BOUNDS,
    zoomMin: e.ZOOM_MIN,
    zoomMax: e.ZOOM_MAX,
    assetTypes: e.ASSET_TYPES,
    gridRings: e.GRID_RINGS,
    gridStepPx: e.GRID_STEP_PX,
    sweepDwellMs: e.SWEEP_DWELL_MS,
    maxComplexes: e.MAX_COMPLEX_DETAIL,
    maxListings: e.MAX_ARTICLE_DETAIL,
    minListingCount: e.MIN_LISTING_COUNT,
    prioritizeByCount: e.PRIORITIZE_BY_COUNT,
    useMobileDetail: e.USE_MOBILE_DETAIL,
    // Desktop detail pages share the navigation context, so only one tab works at a time
    workerCount: e.USE_MOBILE_DETAIL ? e.DETAIL_WORKERS : 1,
    requirePreviousLease: e.ONLY_WITH_PREV_LEASE,
    gapFilterEnabled: e.ONLY_PREV_GTE_SALE,
    blockHeavyResources: e.BLOCK_HEAVY_RESOURCES,
    responseTimeoutMs: e.RESPONSE_TIMEOUT_MS,
  };
}
