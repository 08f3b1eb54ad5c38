import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import { DEFAULT_WEIGHT_CLASS_TABLE } from './classification.js';
import { DEFAULT_MAX_SPEED_MPS } from './analytics.js';
import { intervalToCron, regionCreditCost } from './utils.js';
import type { AnalyticsOptions, Credentials, Region, TransformOptions, WeightClass } from './types.js';

export type AppConfig = {
  credentials: Credentials;
  authUrl: string;
  apiBase: string;
  port: number;
  refreshIntervalSec: number;
  refreshCron: string;
  fetchTimeoutSec: number;
  dailyCreditLimit: number;
  tokenSafetyMarginSec: number;
  rawCacheTtlSec: number;
  regions: Region[];
  transform: TransformOptions;
  analytics: AnalyticsOptions;
}

const OPENSKY_AUTH_URL = 'https://auth.opensky-network.org/auth/realms/opensky-network/protocol/openid-connect/token';
const OPENSKY_API_BASE = 'https://opensky-network.org/api';
const DEFAULT_PIPELINE_CONFIG = 'config/pipeline.json';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  OPENSKY_CLIENT_ID: z.string({ required_error: 'is required' }).min(1, 'is required'),
  OPENSKY_CLIENT_SECRET: z.string({ required_error: 'is required' }).min(1, 'is required'),
  OPENSKY_AUTH_URL: z.string().url().default(OPENSKY_AUTH_URL),
  OPENSKY_API_BASE: z.string().url().default(OPENSKY_API_BASE),
  PORT: positiveInt(3000),
  REFRESH_INTERVAL_SEC: positiveInt(60),
  FETCH_TIMEOUT_SEC: positiveInt(20),
  DAILY_CREDIT_LIMIT: positiveInt(4000),
  ANOMALY_STDDEV_THRESHOLD: z.coerce.number().positive().default(3),
  CLIMB_RATE_THRESHOLD_MPS: z.coerce.number().nonnegative().default(1),
  HEADING_SECTORS: z.enum(['8', '16']).default('8'),
  TOKEN_SAFETY_MARGIN_SEC: z.coerce.number().int().nonnegative().default(300),
  RAW_CACHE_TTL_SEC: positiveInt(300),
  PIPELINE_CONFIG: z.string().min(1).default(DEFAULT_PIPELINE_CONFIG),
});

const weightClassSchema = z.enum(['LIGHT', 'SMALL', 'LARGE', 'HEAVY', 'HIGH_PERF', 'ROTORCRAFT', 'UNKNOWN']);

const bboxSchema = z.object({
  lamin: z.number().min(-90).max(90),
  lamax: z.number().min(-90).max(90),
  lomin: z.number().min(-180).max(180),
  lomax: z.number().min(-180).max(180),
}).refine(b => b.lamin < b.lamax && b.lomin < b.lomax, {
  message: 'bounding box must satisfy lamin < lamax and lomin < lomax',
});

const pipelineSchema = z.object({
  regions: z.array(z.object({
    name: z.string().regex(/^[a-z0-9_-]+$/, 'region name must be lowercase letters, digits, "_" or "-"'),
    bbox: bboxSchema,
  })).min(1, 'at least one region must be configured'),
  maxSpeedMps: z.record(weightClassSchema, z.number().positive()).optional(),
  weightClassByCategory: z.record(z.string(), weightClassSchema).optional(),
}).superRefine((value, ctx) => {
  const seen = new Set<string>();
  for (const region of value.regions) {
    if (seen.has(region.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate region "${region.name}"`, path: ['regions'] });
    }
    seen.add(region.name);
  }
});

const formatIssues = (error: z.ZodError, prefix: string): string[] => {
  return error.issues.map(issue => {
    return issue.path.length ? `${prefix}${issue.path.join('.')}: ${issue.message}` : issue.message;
  });
};

const readPipelineFile = (path: string): unknown => {
  const fullPath = resolve(process.cwd(), path);
  try {
    return JSON.parse(readFileSync(fullPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError([`cannot read pipeline config ${fullPath}: ${errorMessage(error)}`]);
  }
};

/**
 * Builds the process configuration from environment variables and the pipeline JSON file.
 * @param pipeline - parsed pipeline document; read from PIPELINE_CONFIG when omitted
 * @throws ConfigurationError listing every problem found
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env, pipeline?: unknown): AppConfig => {
  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new ConfigurationError(formatIssues(envResult.error, ''));
  }
  const vars = envResult.data;

  const pipelineResult = pipelineSchema.safeParse(pipeline ?? readPipelineFile(vars.PIPELINE_CONFIG));
  if (!pipelineResult.success) {
    throw new ConfigurationError(formatIssues(pipelineResult.error, 'pipeline.'));
  }
  const doc = pipelineResult.data;

  const issues: string[] = [];
  const refreshCron = intervalToCron(vars.REFRESH_INTERVAL_SEC);
  if (!refreshCron) {
    issues.push(`REFRESH_INTERVAL_SEC=${vars.REFRESH_INTERVAL_SEC} does not divide evenly into a minute, hour or day`);
  }
  if (vars.FETCH_TIMEOUT_SEC >= vars.REFRESH_INTERVAL_SEC) {
    issues.push('FETCH_TIMEOUT_SEC must be shorter than REFRESH_INTERVAL_SEC');
  }
  if (issues.length || !refreshCron) {
    throw new ConfigurationError(issues);
  }

  const headingSectors = vars.HEADING_SECTORS === '16' ? 16 : 8;
  const maxSpeedMps: Record<WeightClass, number> = { ...DEFAULT_MAX_SPEED_MPS, ...doc.maxSpeedMps };

  return {
    credentials: Object.freeze({
      clientId: vars.OPENSKY_CLIENT_ID,
      clientSecret: vars.OPENSKY_CLIENT_SECRET,
    }),
    authUrl: vars.OPENSKY_AUTH_URL,
    apiBase: vars.OPENSKY_API_BASE.replace(/\/+$/, ''),
    port: vars.PORT,
    refreshIntervalSec: vars.REFRESH_INTERVAL_SEC,
    refreshCron,
    fetchTimeoutSec: vars.FETCH_TIMEOUT_SEC,
    dailyCreditLimit: vars.DAILY_CREDIT_LIMIT,
    tokenSafetyMarginSec: vars.TOKEN_SAFETY_MARGIN_SEC,
    rawCacheTtlSec: vars.RAW_CACHE_TTL_SEC,
    regions: doc.regions.map(r => ({ name: r.name, bbox: r.bbox, creditCost: regionCreditCost(r.bbox) })),
    transform: {
      climbRateThresholdMps: vars.CLIMB_RATE_THRESHOLD_MPS,
      headingSectors,
      weightClassTable: { ...DEFAULT_WEIGHT_CLASS_TABLE, ...doc.weightClassByCategory },
    },
    analytics: {
      stdDevThreshold: vars.ANOMALY_STDDEV_THRESHOLD,
      minSamples: 3,
      headingSectors,
      maxSpeedMps,
    },
  };
};
