import { mkdtempSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import type { FlightRecord } from '../server/loader.js';

export const CSV_HEADER =
  'RunwayNum,Distance miles,FlightNum,WeatherConditions,ScheduledDeparture,ActualDeparture,Destination';

export function makeRecord(overrides: Partial<FlightRecord> = {}): FlightRecord {
  return {
    runwayNumber: '2',
    distanceMiles: '300',
    flightNumber: 'IB100',
    weatherConditions: 'Clear',
    scheduledDeparture: '08:00',
    actualDeparture: '08:00',
    destinationCode: 'LIS',
    ...overrides,
  };
}

export function makeTempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'departure-stats-'));
}

/** Writes a CSV with the standard header and returns its path. */
export function writeCSV(dir: string, fileName: string, rows: string[]): string {
  const file = path.join(dir, fileName);
  writeFileSync(file, [CSV_HEADER, ...rows].join('\n') + '\n', 'utf-8');
  return file;
}
