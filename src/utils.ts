import type { BoundingBox, HeadingSectorCount } from './types.js';

export const isObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
};

/**
 * Coerces an upstream value to a finite number.
 * null, NaN, infinities and non-numeric strings are unknown (null), never zero.
 */
export const toFiniteNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const toTrimmedString = (value: unknown): string | null => {
  return typeof value === 'string' ? value.trim() : null;
};

export const bboxArea = (bbox: BoundingBox): number => {
  return (bbox.lamax - bbox.lamin) * (bbox.lomax - bbox.lomin);
};

/**
 * Credits charged for one /states/all query, tiered by box area in square degrees
 */
export const regionCreditCost = (bbox: BoundingBox): number => {
  const area = bboxArea(bbox);
  if (area <= 25) return 1;
  if (area <= 100) return 2;
  if (area <= 400) return 3;
  return 4;
};

/**
 * Maps a refresh interval onto a node-cron expression (six fields, seconds first).
 * @returns null if the interval does not divide evenly into a minute, hour or day
 */
export const intervalToCron = (intervalSec: number): string | null => {
  if (!Number.isInteger(intervalSec) || intervalSec <= 0) return null;

  if (intervalSec < 60) {
    return 60 % intervalSec === 0 ? `*/${intervalSec} * * * * *` : null;
  }
  if (intervalSec % 60 === 0 && intervalSec < 3600) {
    const minutes = intervalSec / 60;
    return 60 % minutes === 0 ? `0 */${minutes} * * * *` : null;
  }
  if (intervalSec % 3600 === 0 && intervalSec <= 86400) {
    const hours = intervalSec / 3600;
    return 24 % hours === 0 ? `0 0 */${hours} * * *` : null;
  }
  return null;
};

const SECTORS_8 = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'];
const SECTORS_16 = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
];

export const sectorLabels = (sectors: HeadingSectorCount): readonly string[] => {
  return sectors === 16 ? SECTORS_16 : SECTORS_8;
};

export const normalizeHeading = (heading: number): number => {
  return ((heading % 360) + 360) % 360;
};

/**
 * Buckets a heading into compass sectors centred on the cardinal points,
 * so N covers [337.5, 22.5) with 8 sectors
 */
export const headingSector = (heading: number, sectors: HeadingSectorCount): string => {
  const labels = sectorLabels(sectors);
  const width = 360 / sectors;
  const index = Math.floor(normalizeHeading(heading + width / 2) / width) % sectors;
  return labels[index];
};

export const ageSec = (since: number, now: number): number => {
  return Math.max(0, Math.floor((now - since) / 1000));
};

// constants
export const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_TOKEN_LIFETIME_SEC = 1800; // used when the token endpoint omits expires_in
export const MAX_AUTH_BACKOFF_MS = 15 * 60 * 1000;

/**
 * Credits for a historical flights query: one per started day of the interval
 */
export const historicalCreditCost = (beginSec: number, endSec: number): number => {
  return Math.max(1, Math.ceil((endSec - beginSec) / 86400));
};
