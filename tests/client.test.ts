import { describe, it, expect, vi, afterEach } from 'vitest';
import { analyzeDataFile, getDirectory, getHistogram } from '../src/api.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('Frontend API client', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('posts the selection as JSON to /api/analysis', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(jsonResponse({ ok: 1 }));

    const res = await analyzeDataFile('MAD', '2024');
    expect(res).toEqual({ ok: true, data: { ok: 1 } });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('/api/analysis');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"airport":"MAD","year":"2024"}');
  });

  it('builds the histogram query string', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(jsonResponse({}));
    await getHistogram('MAD', '2024', 'BA');
    expect(fetchSpy.mock.calls[0][0]).toBe('/api/histogram?airport=MAD&year=2024&airline=BA');
  });

  it('surfaces the server message for a rejected request without retrying', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(
      jsonResponse({ error: 'Unavailable Airline code - please try again' }, 400),
    );

    const res = await getHistogram('MAD', '2024', 'ZZ');
    expect(res).toEqual({ ok: false, error: 'Unavailable Airline code - please try again', status: 400 });
    expect(fetchSpy).toHaveBeenCalledOnce();
  });

  it('does not retry a failed analysis, which may already have been saved', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(
      jsonResponse({ error: 'Failed to analyse flight data' }, 500),
    );

    const res = await analyzeDataFile('MAD', '2024');
    expect(res).toEqual({ ok: false, error: 'Failed to analyse flight data', status: 500 });
    expect(fetchSpy).toHaveBeenCalledOnce();
  });

  it('retries after a rate-limit response', async () => {
    vi.useFakeTimers();
    const fetchSpy = vi.spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ error: 'Too many requests' }, 429))
      .mockResolvedValueOnce(jsonResponse({ airports: [], airlines: [], years: { min: 2000, max: 2025 } }));

    const pending = getDirectory();
    await vi.advanceTimersByTimeAsync(1000);
    const res = await pending;

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(res.ok).toBe(true);
  });
});
