import { z } from 'zod';
import type { FlightRecord, RecordFilter, WeightClass } from './types.js';

const WEIGHT_CLASSES: [WeightClass, ...WeightClass[]] = [
  'LIGHT', 'SMALL', 'LARGE', 'HEAVY', 'HIGH_PERF', 'ROTORCRAFT', 'UNKNOWN',
];

const nonEmpty = z.string().trim().min(1);

/**
 * Query string -> RecordFilter. Values are case-insensitive.
 */
export const recordFilterQuerySchema = z.object({
  weight_class: z.string().trim().toUpperCase()
    .pipe(z.enum(WEIGHT_CLASSES, { errorMap: () => ({ message: `weight_class must be one of ${WEIGHT_CLASSES.join(', ')}` }) }))
    .optional(),
  country: nonEmpty.optional(),
  callsign: nonEmpty.optional(),
  anomalous: z.enum(['true', 'false']).optional(),
}).transform((query): RecordFilter => ({
  weightClass: query.weight_class,
  country: query.country,
  callsign: query.callsign,
  anomalousOnly: query.anomalous === 'true',
}));

/**
 * Keeps the records matching every given criterion. Country is an exact match,
 * callsign a substring match; both ignore case.
 */
export const filterRecords = (records: readonly FlightRecord[], filter: RecordFilter): FlightRecord[] => {
  const country = filter.country?.toLowerCase();
  const callsign = filter.callsign?.toUpperCase();

  return records.filter(record => {
    if (filter.weightClass && record.weight_class !== filter.weightClass) return false;
    if (country && record.country.toLowerCase() !== country) return false;
    if (callsign && !record.callsign.toUpperCase().includes(callsign)) return false;
    if (filter.anomalousOnly && !record.is_anomalous) return false;
    return true;
  });
};
