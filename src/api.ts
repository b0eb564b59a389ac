// =============================================================================
// Frontend API Client — communicates with the Departure Stats backend
// =============================================================================

import type { DirectoryEntry } from '../server/directory.js';
import type { HistogramData, HistogramLayout } from '../server/histogram.js';
import type { AnalysisResult } from '../server/metrics.js';
import type { DataFileSelection } from '../server/selection.js';

const API_BASE = '/api';

// --- Structured error result type ---

export type ApiResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string; status?: number };

// --- Retry & timeout configuration ---

const MAX_RETRIES = 2;
const RETRY_DELAYS = [1000, 2000];
const REQUEST_TIMEOUT_MS = 15_000;

// --- Error message helpers ---

function classifyError(err: unknown, status?: number, serverMessage?: string): { error: string; status?: number } {
  if (err instanceof DOMException && err.name === 'AbortError') {
    return { error: 'Request timed out — try again.' };
  }
  if (err instanceof TypeError && (err.message.includes('fetch') || err.message.includes('network') || err.message.includes('Failed'))) {
    return { error: 'Backend server is not running. Start it with: npm run dev:server' };
  }
  if (status === 429) {
    return { error: 'Too many requests. Wait a minute and try again.', status };
  }
  // 4xx bodies carry the message meant for the user (bad code, missing file…)
  if (serverMessage) {
    return { error: serverMessage, status };
  }
  if (status !== undefined && status >= 500) {
    return { error: 'Server error while analysing data. Check the API logs.', status };
  }
  if (status !== undefined && !isOkStatus(status)) {
    return { error: `API error: ${status}`, status };
  }
  const msg = err instanceof Error ? err.message : String(err);
  return { error: msg };
}

function isOkStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function isRetryable(status?: number, err?: unknown): boolean {
  if (err instanceof DOMException && err.name === 'AbortError') return true;
  if (err instanceof TypeError) return true;
  if (status !== undefined && (status === 429 || status >= 500)) return true;
  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function readErrorMessage(res: Response): Promise<string | undefined> {
  try {
    const body: unknown = await res.json();
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return body.error;
    }
  } catch {
    // non-JSON error page
  }
  return undefined;
}

// --- Core fetch with retry + timeout ---

export async function apiFetchSafe<T>(path: string, options?: RequestInit): Promise<ApiResult<T>> {
  let lastError: unknown;
  let lastStatus: number | undefined;
  // POST /analysis appends to the report, so only reads are retried
  const maxRetries = (options?.method ?? 'GET').toUpperCase() === 'GET' ? MAX_RETRIES : 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      await sleep(RETRY_DELAYS[attempt - 1] ?? RETRY_DELAYS[RETRY_DELAYS.length - 1]);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const res = await fetch(`${API_BASE}${path}`, {
        ...options,
        signal: controller.signal,
        headers: { 'Accept': 'application/json', ...options?.headers },
      });

      clearTimeout(timeoutId);
      lastStatus = res.status;

      if (!res.ok) {
        if (isRetryable(res.status) && attempt < maxRetries) {
          lastError = new Error(`HTTP ${res.status}`);
          continue;
        }
        const serverMessage = await readErrorMessage(res);
        return { ok: false, ...classifyError(new Error(`HTTP ${res.status}`), res.status, serverMessage) };
      }

      const data = (await res.json()) as T;
      return { ok: true, data };
    } catch (err) {
      clearTimeout(timeoutId);
      lastError = err;
      lastStatus = undefined;

      if (isRetryable(undefined, err) && attempt < maxRetries) {
        continue;
      }

      return { ok: false, ...classifyError(err) };
    }
  }

  return { ok: false, ...classifyError(lastError, lastStatus) };
}

// --- Types matching server responses ---

export type { AnalysisResult, DataFileSelection, DirectoryEntry, HistogramData, HistogramLayout };

export type DirectoryResponse = {
  airports: DirectoryEntry[];
  airlines: DirectoryEntry[];
  years: { min: number; max: number };
};

export type ReportStatus = {
  saved: boolean;
  path: string;
  error?: string;
};

export type AnalysisResponse = {
  selection: DataFileSelection;
  result: AnalysisResult;
  report: ReportStatus;
};

export type HistogramResponse = {
  selection: DataFileSelection;
  histogram: HistogramData;
  layout: HistogramLayout;
};

// --- Endpoints ---

export function getDirectory(): Promise<ApiResult<DirectoryResponse>> {
  return apiFetchSafe<DirectoryResponse>('/directory');
}

export function analyzeDataFile(airport: string, year: string): Promise<ApiResult<AnalysisResponse>> {
  return apiFetchSafe<AnalysisResponse>('/analysis', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ airport, year }),
  });
}

export function getHistogram(airport: string, year: string, airline: string): Promise<ApiResult<HistogramResponse>> {
  const params = new URLSearchParams({ airport, year, airline });
  return apiFetchSafe<HistogramResponse>(`/histogram?${params.toString()}`);
}
