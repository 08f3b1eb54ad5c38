import type { FlightRecord } from './types.js';

export const CSV_COLUMNS = [
  'icao24', 'callsign', 'country', 'lat', 'lon', 'altitude_m', 'speed_mps',
  'heading_deg', 'vertical_rate_mps', 'weight_class', 'flight_phase', 'is_anomalous',
] as const;

type CsvCell = string | number | boolean | null;

const escapeCell = (value: CsvCell): string => {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

const toRow = (record: FlightRecord): CsvCell[] => [
  record.icao24,
  record.callsign,
  record.country,
  record.position?.lat ?? null,
  record.position?.lon ?? null,
  record.altitude_m,
  record.speed_mps,
  record.heading_deg,
  record.vertical_rate_mps,
  record.weight_class,
  record.flight_phase,
  record.is_anomalous,
];

/**
 * Serializes records with a fixed column order. Unknown values become empty cells.
 */
export const toCsv = (records: readonly FlightRecord[]): string => {
  const lines = [CSV_COLUMNS.join(',')];
  for (const record of records) {
    lines.push(toRow(record).map(escapeCell).join(','));
  }
  return `${lines.join('\n')}\n`;
};
