import path from 'path';
import dotenv from 'dotenv';

// ── env ──────────────────────────────────────────────────────────────────────
dotenv.config({ path: '.env.local' });
dotenv.config();

export const NODE_ENV = process.env.NODE_ENV || 'development';
export const API_PORT = Number(process.env.API_PORT) || 3001;

// Per-airport CSVs named <CODE><YYYY>.csv, e.g. data/flights/MAD2024.csv
export const DATA_DIR = process.env.DATA_DIR || path.resolve(process.cwd(), 'data/flights');
export const REPORT_PATH = process.env.REPORT_PATH || path.resolve(process.cwd(), 'results.txt');
export const DIRECTORY_PATH = process.env.DIRECTORY_PATH || path.resolve(process.cwd(), 'data/directory.json');

// ---------------------------------------------------------------------------
// Analysis constants
//
// The source airports only publish departures for a 12-hour window
// (00:00–11:59). Both the hourly average and the histogram are tied to it;
// data spanning a full day needs these raised, otherwise later hours are
// dropped from the histogram.
// ---------------------------------------------------------------------------
export const OPERATING_WINDOW_HOURS = 12;
export const HISTOGRAM_BINS = 12;
export const LONG_FLIGHT_MILES = 500;
export const DEFAULT_TRACKED_AIRLINES: readonly string[] = ['BA', 'AF'];

export const YEAR_RANGE = { min: 2000, max: 2025 } as const;
