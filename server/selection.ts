import path from 'path';
import { DATA_DIR, YEAR_RANGE } from './config.js';
import { DIRECTORY, type FlightDirectory } from './directory.js';

// =============================================================================
// Data-file selection: <CODE><YYYY>.csv, e.g. MAD2024.csv
// =============================================================================

export type Validation<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export type DataFileSelection = {
  airportCode: string;
  airportName: string;
  year: number;
  fileName: string;
};

export function validateAirportCode(
  input: string,
  directory: FlightDirectory = DIRECTORY,
): Validation<string> {
  const code = input.trim().toUpperCase();
  if (code.length !== 3) {
    return { ok: false, error: 'Wrong code length - please enter a three-letter city code' };
  }
  if (!directory.hasAirport(code)) {
    return { ok: false, error: 'Unavailable city code - please enter a valid city code' };
  }
  return { ok: true, value: code };
}

export function validateYear(input: string | number): Validation<number> {
  const text = String(input).trim();
  if (!/^\d+$/.test(text)) {
    return { ok: false, error: 'Wrong data type - please enter a four-digit year value' };
  }
  const year = parseInt(text, 10);
  if (year < YEAR_RANGE.min || year > YEAR_RANGE.max) {
    return {
      ok: false,
      error: `Out of range - please enter a value from ${YEAR_RANGE.min} to ${YEAR_RANGE.max}`,
    };
  }
  return { ok: true, value: year };
}

export function selectDataFile(
  airportCode: string,
  year: number,
  directory: FlightDirectory = DIRECTORY,
): DataFileSelection {
  return {
    airportCode,
    airportName: directory.airportName(airportCode),
    year,
    fileName: `${airportCode}${year}.csv`,
  };
}

/** Validate raw airport/year input and build the selection in one step. */
export function resolveSelection(
  airport: string,
  year: string | number,
  directory: FlightDirectory = DIRECTORY,
): Validation<DataFileSelection> {
  const code = validateAirportCode(airport, directory);
  if (!code.ok) return code;
  const checkedYear = validateYear(year);
  if (!checkedYear.ok) return checkedYear;
  return { ok: true, value: selectDataFile(code.value, checkedYear.value, directory) };
}

export function parseDataFileName(fileName: string): { airportCode: string; year: string } {
  const base = path.basename(fileName);
  return { airportCode: base.slice(0, 3), year: base.slice(3, 7) };
}

export function selectionLine(selection: DataFileSelection): string {
  return `File ${selection.fileName} selected - Planes departing ${selection.airportName} ${selection.year}.`;
}

export function dataFilePath(selection: DataFileSelection, dataDir: string = DATA_DIR): string {
  return path.join(dataDir, selection.fileName);
}
