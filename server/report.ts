import { appendFileSync } from 'fs';
import { REPORT_PATH } from './config.js';
import { ReportWriteError } from './errors.js';
import type { AnalysisResult } from './metrics.js';
import { selectionLine, type DataFileSelection } from './selection.js';

// =============================================================================
// Results report — one fixed text block per run, appended to results.txt
// =============================================================================

const BANNER = '*'.repeat(70);

export type ReportOutcome =
  | { ok: true; path: string }
  | { ok: false; path: string; error: ReportWriteError };

export function formatMetricLines(result: AnalysisResult): string[] {
  return [
    `The total number of flights from this airport was ${result.totalFlights}`,
    `The total number of flights departing Runway one was ${result.runway1Flights}`,
    `The total number of departures of flights over 500 miles was ${result.longFlights}`,
    `There were ${result.airlineFlights.BA ?? 0} British Airways flights from this airport`,
    `There were ${result.rainFlights} flights from this airport departing in rain`,
    `There was an average of ${result.avgFlightsPerHour} flights per hour from this airport`,
    `Air France planes made up ${result.afPercentage}% of all departures`,
    `${result.delayedPercentage}% of all departures were delayed`,
    `There were ${result.rainHoursCount} hours in which rain fell`,
    `The most common destinations are ${result.commonDestinations.join(', ')}`,
  ];
}

export function formatReport(selection: DataFileSelection, result: AnalysisResult): string {
  const lines = [
    BANNER,
    selectionLine(selection),
    BANNER,
    '',
    ...formatMetricLines(result),
    BANNER,
    '',
  ];
  return lines.join('\n') + '\n';
}

/** Append a report block. Failures are logged and returned, never thrown. */
export function appendReport(text: string, reportPath: string = REPORT_PATH): ReportOutcome {
  try {
    appendFileSync(reportPath, text, 'utf-8');
    console.log(`[Report] Results successfully saved to ${reportPath}`);
    return { ok: true, path: reportPath };
  } catch (err) {
    const error = new ReportWriteError(reportPath, err);
    console.error(`[Report] ${error.message}`);
    return { ok: false, path: reportPath, error };
  }
}
