import { readFileSync } from 'fs';
import { MalformedRecordError, type FlightField } from './errors.js';

// =============================================================================
// Record Loader
//
// Reads one <CODE><YYYY>.csv departure file into immutable FlightRecords.
// A missing file is not an error here: callers get an empty list and a
// 'not-found' status and decide how to report it. A row that lacks a column
// the header promises is an error, and stops the load.
// =============================================================================

export type FlightRecord = Readonly<{
  runwayNumber: string;
  distanceMiles: string;
  flightNumber: string;
  weatherConditions: string;
  scheduledDeparture: string;
  actualDeparture: string;
  destinationCode: string;
}>;

export type LoadStatus = 'ok' | 'not-found';

export type LoadResult = {
  status: LoadStatus;
  records: readonly FlightRecord[];
};

// CSV header → record field
export const FLIGHT_COLUMNS: Readonly<Record<FlightField, string>> = {
  runwayNumber: 'RunwayNum',
  distanceMiles: 'Distance miles',
  flightNumber: 'FlightNum',
  weatherConditions: 'WeatherConditions',
  scheduledDeparture: 'ScheduledDeparture',
  actualDeparture: 'ActualDeparture',
  destinationCode: 'Destination',
};

// ---------------------------------------------------------------------------
// CSV parser (tiny, zero-dep). Handles double-quoted values with "" escapes.
// ---------------------------------------------------------------------------
export function splitCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      values.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  values.push(current);
  return values;
}

// Splits on line breaks outside double quotes, so a quoted value may span lines
export function splitCSVRows(text: string): string[] {
  const rows: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') quoted = !quoted;
    if (ch === '\n' && !quoted) {
      rows.push(current.endsWith('\r') ? current.slice(0, -1) : current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (current.length > 0) rows.push(current);
  return rows;
}

export function parseCSV(text: string): Record<string, string>[] {
  const lines = splitCSVRows(text.replace(/^\uFEFF/, ''))
    .filter(line => line.length > 0);
  if (lines.length === 0) return [];

  const headers = splitCSVLine(lines[0]);
  return lines.slice(1).map(line => {
    const vals = splitCSVLine(line);
    const row: Record<string, string> = {};
    // Short rows leave trailing columns absent rather than empty
    headers.forEach((h, i) => {
      if (i < vals.length) row[h] = vals[i];
    });
    return row;
  });
}

export function toFlightRecords(rows: readonly Record<string, string>[]): readonly FlightRecord[] {
  return Object.freeze(rows.map((row, index) => {
    const pick = (field: FlightField): string => {
      const column = FLIGHT_COLUMNS[field];
      const value = row[column];
      if (value === undefined) throw new MalformedRecordError(column, field, index);
      return value;
    };

    const record: FlightRecord = {
      runwayNumber: pick('runwayNumber'),
      distanceMiles: pick('distanceMiles'),
      flightNumber: pick('flightNumber'),
      weatherConditions: pick('weatherConditions'),
      scheduledDeparture: pick('scheduledDeparture'),
      actualDeparture: pick('actualDeparture'),
      destinationCode: pick('destinationCode'),
    };
    return Object.freeze(record);
  }));
}

function isMissingSource(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'EACCES' || err.code === 'EISDIR';
}

export function readFlightSource(source: string): LoadResult {
  let text: string;
  try {
    text = readFileSync(source, 'utf-8');
  } catch (err) {
    if (!isMissingSource(err)) throw err;
    console.warn(`[Loader] Error: File ${source} not found.`);
    return { status: 'not-found', records: [] };
  }

  return { status: 'ok', records: toFlightRecords(parseCSV(text)) };
}

export function loadFlightRecords(source: string): readonly FlightRecord[] {
  return readFlightSource(source).records;
}
