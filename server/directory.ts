import { readFileSync } from 'fs';
import { z } from 'zod';
import { DIRECTORY_PATH } from './config.js';

// =============================================================================
// Flight Directory
//
// The single read-only lookup table for airport display names and the airline
// allow-list. Loaded from data/directory.json once and handed to whichever
// component needs it; nothing mutates it after load.
// =============================================================================

const DirectoryFile = z.object({
  airports: z.record(z.string().length(3), z.string().min(1)),
  airlines: z.record(z.string().length(2), z.string().min(1)),
});

export type DirectoryEntry = {
  code: string;
  name: string;
};

export interface FlightDirectory {
  readonly airports: readonly DirectoryEntry[];
  readonly airlines: readonly DirectoryEntry[];
  /** Display name for an airport code, or the code itself when unknown. */
  airportName(code: string): string;
  airlineName(code: string): string | undefined;
  hasAirport(code: string): boolean;
  hasAirline(code: string): boolean;
}

function toEntries(table: Record<string, string>): readonly DirectoryEntry[] {
  return Object.freeze(
    Object.entries(table).map(([code, name]) => Object.freeze({ code, name })),
  );
}

export function createDirectory(data: {
  airports: Record<string, string>;
  airlines: Record<string, string>;
}): FlightDirectory {
  const airports = new Map(Object.entries(data.airports));
  const airlines = new Map(Object.entries(data.airlines));

  return Object.freeze({
    airports: toEntries(data.airports),
    airlines: toEntries(data.airlines),
    airportName: (code: string) => airports.get(code) ?? code,
    airlineName: (code: string) => airlines.get(code),
    hasAirport: (code: string) => airports.has(code),
    hasAirline: (code: string) => airlines.has(code),
  });
}

export function loadDirectory(filePath: string = DIRECTORY_PATH): FlightDirectory {
  const parsed = DirectoryFile.parse(JSON.parse(readFileSync(filePath, 'utf-8')));
  return createDirectory(parsed);
}

export const DIRECTORY: FlightDirectory = loadDirectory();
