import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { readFileSync, rmSync } from 'fs';
import type { Server } from 'http';
import path from 'path';
import { createApp } from '../server/app.js';
import { makeTempDir, writeCSV } from './helpers.js';

let server: Server;
let base: string;
let dir: string;
let reportPath: string;

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});

  dir = makeTempDir();
  reportPath = path.join(dir, 'results.txt');
  writeCSV(dir, 'MAD2024.csv', [
    '1,600,BA123,Light rain,09:15,09:30,MAD',
    '2,300,AF456,Clear,09:00,09:00,MAD',
    '1,850,BA900,Clear,13:00,13:00,LHR',
  ]);
  writeCSV(dir, 'FRA2023.csv', [
    '2,400,BA10,Clear,08:00,08:00,LHR',
    '2,400,BA11,Clear,24:00,24:00,LHR',
  ]);
  writeCSV(dir, 'LIS2020.csv', [
    '1,far,TP100,Clear,06:00,06:00,MAD',
  ]);

  const app = createApp({ dataDir: dir, reportPath });
  await new Promise<void>(resolve => {
    server = app.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function postAnalysis(body: unknown): Promise<Response> {
  return fetch(`${base}/api/analysis`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('API Endpoints', () => {
  it('GET /api/health returns 200 with status ok', async () => {
    const res = await fetch(`${base}/api/health`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.status).toBe('ok');
    expect(body.timestamp).toBeDefined();
  });

  it('GET /api/directory lists airports, airlines and the year range', async () => {
    const res = await fetch(`${base}/api/directory`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.airports).toHaveLength(10);
    expect(body.airlines).toHaveLength(16);
    expect(body.airports[0]).toEqual({ code: 'LHR', name: 'London Heathrow' });
    expect(body.years).toEqual({ min: 2000, max: 2025 });
  });

  it('POST /api/analysis returns metrics and appends the report', async () => {
    const res = await postAnalysis({ airport: 'mad', year: '2024' });
    expect(res.status).toBe(200);
    const body = await res.json();

    expect(body.selection).toEqual({
      airportCode: 'MAD',
      airportName: 'Madrid Adolfo Suárez-Barajas',
      year: 2024,
      fileName: 'MAD2024.csv',
    });
    expect(body.result).toMatchObject({
      totalFlights: 3,
      runway1Flights: 2,
      longFlights: 2,
      airlineFlights: { BA: 2, AF: 1 },
      rainFlights: 1,
      rainHoursCount: 1,
      delayedFlights: 1,
      avgFlightsPerHour: 0.25,
      afPercentage: 33.33,
      delayedPercentage: 33.33,
      commonDestinations: ['Madrid Adolfo Suárez-Barajas'],
    });
    expect(body.report).toEqual({ saved: true, path: reportPath });
    expect(readFileSync(reportPath, 'utf-8')).toContain(
      'File MAD2024.csv selected - Planes departing Madrid Adolfo Suárez-Barajas 2024.\n',
    );
  });

  it('POST /api/analysis rejects invalid selections with the user message', async () => {
    const res1 = await postAnalysis({ airport: 'MA', year: 2024 });
    expect(res1.status).toBe(400);
    expect((await res1.json()).error).toBe('Wrong code length - please enter a three-letter city code');

    const res2 = await postAnalysis({ airport: 'MAD', year: 1990 });
    expect(res2.status).toBe(400);
    expect((await res2.json()).error).toBe('Out of range - please enter a value from 2000 to 2025');

    const res3 = await postAnalysis({ airport: 42 });
    expect(res3.status).toBe(400);
    expect((await res3.json()).error).toBe('Invalid request');
  });

  it('POST /api/analysis returns 404 for a missing data file', async () => {
    const res = await postAnalysis({ airport: 'CDG', year: 2010 });
    expect(res.status).toBe(404);
    expect((await res.json()).error).toBe('File CDG2010.csv not found.');
  });

  it('POST /api/analysis returns 422 naming the field that failed to parse', async () => {
    const res = await postAnalysis({ airport: 'LIS', year: 2020 });
    expect(res.status).toBe(422);
    const body = await res.json();
    expect(body.field).toBe('distanceMiles');
    expect(body.index).toBe(0);
  });

  it('GET /api/histogram returns bins and layout for an airline', async () => {
    const res = await fetch(`${base}/api/histogram?airport=MAD&year=2024&airline=ba`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.histogram).toEqual({
      airlineCode: 'BA',
      bins: [0, 0, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0],
    });
    expect(body.layout.title.text).toBe('BA Departures from Madrid Adolfo Suárez-Barajas 2024');
    expect(body.layout.bars).toHaveLength(12);
  });

  it('GET /api/histogram drops departures outside the window instead of failing', async () => {
    const res = await fetch(`${base}/api/histogram?airport=FRA&year=2023&airline=BA`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.histogram.bins).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 1, 0, 0, 0]);
  });

  it('GET /api/histogram rejects an unknown airline before loading the file', async () => {
    // CDG2010.csv does not exist, so a 404 would mean the file was looked up
    const res = await fetch(`${base}/api/histogram?airport=CDG&year=2010&airline=ZZ`);
    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error).toBe('Unavailable Airline code - please try again');
    expect(body.reason).toBe('unknown-airline');
  });

  it('GET /api/histogram requires airport, year and airline', async () => {
    const res = await fetch(`${base}/api/histogram?airport=MAD`);
    expect(res.status).toBe(400);
    expect((await res.json()).error).toContain('required');
  });
});
