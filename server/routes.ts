/**
 * API route handlers: directory lookup, per-file analysis and the airline
 * departure histogram. Every request reloads its CSV; nothing is cached.
 */
import { Express, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { DATA_DIR, NODE_ENV, REPORT_PATH, YEAR_RANGE } from './config.js';
import { DIRECTORY, type FlightDirectory } from './directory.js';
import { isFlightDataError } from './errors.js';
import { binDepartures, checkAirlineCode, layoutHistogram } from './histogram.js';
import { readFlightSource, type LoadResult } from './loader.js';
import { analyzeFlights } from './metrics.js';
import { appendReport, formatReport } from './report.js';
import { dataFilePath, resolveSelection, type DataFileSelection } from './selection.js';

export type RouteOptions = {
  dataDir?: string;
  reportPath?: string;
  directory?: FlightDirectory;
};

const AnalysisRequest = z.object({
  airport: z.string(),
  year: z.union([z.string(), z.number()]),
});

function sendDataError(res: Response, err: unknown): boolean {
  if (!isFlightDataError(err)) return false;
  res.status(422).json({ error: err.message, field: err.field, index: err.index });
  return true;
}

function sendNotFound(res: Response, selection: DataFileSelection): void {
  res.status(404).json({ error: `File ${selection.fileName} not found.`, selection });
}

export function registerRoutes(app: Express, options: RouteOptions = {}): void {
  const dataDir = options.dataDir ?? DATA_DIR;
  const reportPath = options.reportPath ?? REPORT_PATH;
  const directory = options.directory ?? DIRECTORY;

  const load = (selection: DataFileSelection): LoadResult =>
    readFlightSource(dataFilePath(selection, dataDir));

  // ---------------------------------------------------------------------------
  // CORS
  // ---------------------------------------------------------------------------
  const isDev = NODE_ENV !== 'production';
  const corsOptions: cors.CorsOptions = isDev
    ? { origin: ['http://localhost:5173'], credentials: true }
    : { origin: false }; // same-origin only in production

  app.use(cors(corsOptions));

  // ---------------------------------------------------------------------------
  // Rate limiting
  // ---------------------------------------------------------------------------
  const apiLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 60,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });

  app.use('/api/', apiLimiter);

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // ---------------------------------------------------------------------------
  // Airport names and the airline allow-list
  // GET /api/directory
  // ---------------------------------------------------------------------------
  app.get('/api/directory', (_req: Request, res: Response) => {
    res.json({
      airports: directory.airports,
      airlines: directory.airlines,
      years: YEAR_RANGE,
    });
  });

  // ---------------------------------------------------------------------------
  // Analyse one data file and append the results report
  // POST /api/analysis { "airport": "MAD", "year": 2024 }
  // ---------------------------------------------------------------------------
  app.post('/api/analysis', (req: Request, res: Response) => {
    try {
      const parsed = AnalysisRequest.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid request', details: parsed.error.format() });
      }

      const selection = resolveSelection(parsed.data.airport, parsed.data.year, directory);
      if (!selection.ok) {
        return res.status(400).json({ error: selection.error });
      }

      const loaded = load(selection.value);
      if (loaded.status === 'not-found') {
        return sendNotFound(res, selection.value);
      }

      const result = analyzeFlights(loaded.records, { directory });
      const outcome = appendReport(formatReport(selection.value, result), reportPath);

      res.json({
        selection: selection.value,
        result,
        report: outcome.ok
          ? { saved: true, path: outcome.path }
          : { saved: false, path: outcome.path, error: outcome.error.message },
      });
    } catch (err) {
      if (sendDataError(res, err)) return;
      console.error('[API] Analysis error:', err);
      res.status(500).json({ error: 'Failed to analyse flight data' });
    }
  });

  // ---------------------------------------------------------------------------
  // Hourly departures histogram for one airline
  // GET /api/histogram?airport=MAD&year=2024&airline=BA
  // ---------------------------------------------------------------------------
  app.get('/api/histogram', (req: Request, res: Response) => {
    try {
      const { airport, year, airline } = req.query;
      if (!airport || !year || !airline) {
        return res.status(400).json({ error: 'airport, year, and airline are required' });
      }

      const selection = resolveSelection(String(airport), String(year), directory);
      if (!selection.ok) {
        return res.status(400).json({ error: selection.error });
      }

      // Reject unknown carriers before the file is read
      const checked = checkAirlineCode(String(airline), directory);
      if (!checked.ok) {
        return res.status(400).json({ error: checked.error, reason: checked.reason });
      }

      const loaded = load(selection.value);
      if (loaded.status === 'not-found') {
        return sendNotFound(res, selection.value);
      }

      const histogram = { airlineCode: checked.code, bins: binDepartures(loaded.records, checked.code) };

      res.json({
        selection: selection.value,
        histogram,
        layout: layoutHistogram(histogram, selection.value),
      });
    } catch (err) {
      if (sendDataError(res, err)) return;
      console.error('[API] Histogram error:', err);
      res.status(500).json({ error: 'Failed to build histogram' });
    }
  });
}
