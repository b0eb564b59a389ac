import { HISTOGRAM_BINS } from './config.js';
import { DIRECTORY, type FlightDirectory } from './directory.js';
import { parseDepartureHour } from './fields.js';
import type { FlightRecord } from './loader.js';

// =============================================================================
// Histogram Binner
//
// Departures per scheduled hour for one airline, over hours 0–11 only.
// Later hours are dropped, not wrapped. The airline code is checked against
// the directory allow-list before any record is looked at.
// =============================================================================

export type HistogramData = {
  airlineCode: string;
  bins: number[];   // HISTOGRAM_BINS entries, index = hour
};

export type HistogramRejection = {
  ok: false;
  reason: 'invalid-length' | 'unknown-airline';
  error: string;
};

export type HistogramOutcome =
  | { ok: true; histogram: HistogramData }
  | HistogramRejection;

export type HistogramOptions = {
  directory?: FlightDirectory;
};

/** Allow-list check only; no data is read. */
export function checkAirlineCode(
  input: string,
  directory: FlightDirectory = DIRECTORY,
): { ok: true; code: string } | HistogramRejection {
  const code = input.trim().toUpperCase();
  if (code.length !== 2) {
    return { ok: false, reason: 'invalid-length', error: 'Please enter a valid 2-character airline code' };
  }
  if (!directory.hasAirline(code)) {
    return { ok: false, reason: 'unknown-airline', error: 'Unavailable Airline code - please try again' };
  }
  return { ok: true, code };
}

export function binDepartures(records: readonly FlightRecord[], code: string): number[] {
  const bins = new Array<number>(HISTOGRAM_BINS).fill(0);

  records.forEach((flight, index) => {
    if (!flight.flightNumber.startsWith(code)) return;
    const hour = parseDepartureHour(flight.scheduledDeparture, index);
    if (hour >= 0 && hour < HISTOGRAM_BINS) bins[hour]++;
  });

  return bins;
}

export function buildHistogram(
  records: readonly FlightRecord[],
  airlineCode: string,
  options: HistogramOptions = {},
): HistogramOutcome {
  const checked = checkAirlineCode(airlineCode, options.directory);
  if (!checked.ok) return checked;

  return {
    ok: true,
    histogram: { airlineCode: checked.code, bins: binDepartures(records, checked.code) },
  };
}

// ---------------------------------------------------------------------------
// Layout
//
// Fixed 900×400 canvas: 60px margin, baseline at y=350, 12 bars in slots of
// 780/18 px with a 15px gap. Bar height is count / max(count) of the plot
// height; an all-zero histogram draws flat bars.
// ---------------------------------------------------------------------------

export const CANVAS = { width: 900, height: 400, margin: 60 } as const;

const PLOT_WIDTH = CANVAS.width - 2 * CANVAS.margin;
const PLOT_HEIGHT = CANVAS.height - 2 * CANVAS.margin;
const BASELINE_Y = 350;
const SLOT_WIDTH = PLOT_WIDTH / 18;
const BAR_GAP = 15;
const BAR_WIDTH = SLOT_WIDTH - BAR_GAP;
const BAR_FILL = 'blue';

export type Point = { x: number; y: number };

export type TextLabel = Point & { text: string };

export type HistogramBar = {
  hour: number;
  count: number;
  x1: number;
  x2: number;
  y1: number;   // baseline
  y2: number;   // top of bar
  height: number;
  fill: string;
  hourLabel: TextLabel;
  countLabel: TextLabel | null;
};

export type HistogramLayout = {
  width: number;
  height: number;
  title: TextLabel;
  axes: { y: [Point, Point]; x: [Point, Point] };
  yCaption: TextLabel;
  bars: HistogramBar[];
};

export type HistogramCaption = {
  airportName: string;
  year: number | string;
};

function formatHour(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

export function layoutHistogram(histogram: HistogramData, caption: HistogramCaption): HistogramLayout {
  const maxCount = Math.max(...histogram.bins, 1);
  const { margin } = CANVAS;

  const bars = histogram.bins.map((count, hour): HistogramBar => {
    const x1 = margin + hour * SLOT_WIDTH + BAR_GAP / 2;
    const height = (count / maxCount) * PLOT_HEIGHT;
    const y2 = BASELINE_Y - height;
    const labelX = x1 + SLOT_WIDTH / 2;

    return {
      hour,
      count,
      x1,
      x2: x1 + BAR_WIDTH,
      y1: BASELINE_Y,
      y2,
      height,
      fill: BAR_FILL,
      hourLabel: { x: labelX, y: BASELINE_Y + 20, text: formatHour(hour) },
      countLabel: count > 0 ? { x: labelX, y: y2 - 15, text: String(count) } : null,
    };
  });

  return {
    width: CANVAS.width,
    height: CANVAS.height,
    title: {
      x: CANVAS.width / 2,
      y: 30,
      text: `${histogram.airlineCode} Departures from ${caption.airportName} ${caption.year}`,
    },
    axes: {
      y: [{ x: margin, y: margin }, { x: margin, y: BASELINE_Y }],
      x: [{ x: margin, y: BASELINE_Y }, { x: CANVAS.width - 50, y: BASELINE_Y }],
    },
    yCaption: { x: margin - 25, y: margin + PLOT_HEIGHT / 2, text: 'Flights' },
    bars,
  };
}
