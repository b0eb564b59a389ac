import {
  DEFAULT_TRACKED_AIRLINES,
  LONG_FLIGHT_MILES,
  OPERATING_WINDOW_HOURS,
} from './config.js';
import { DIRECTORY, type FlightDirectory } from './directory.js';
import { parseDepartureHour, parseDistance, roundHalfUp } from './fields.js';
import type { FlightRecord } from './loader.js';

// =============================================================================
// Metrics Engine
//
// One pass over a loaded record list → AnalysisResult. No state survives the
// call, so the same records always give the same result. A bad distance or
// departure time throws FieldParseError and no partial result is returned;
// an empty list is a valid input and yields all zeros.
// =============================================================================

export type AnalysisResult = {
  totalFlights: number;
  runway1Flights: number;
  longFlights: number;          // distance strictly over 500 miles
  airlineFlights: Record<string, number>;
  rainFlights: number;
  rainHoursCount: number;       // distinct scheduled hours among rain flights
  delayedFlights: number;
  avgFlightsPerHour: number;    // over the fixed operating window
  afPercentage: number;
  delayedPercentage: number;
  commonDestinations: string[];
};

export type AnalysisOptions = {
  directory?: FlightDirectory;
  trackedAirlines?: readonly string[];
};

export function countAirlineFlights(records: readonly FlightRecord[], code: string): number {
  let count = 0;
  for (const flight of records) {
    if (flight.flightNumber.startsWith(code)) count++;
  }
  return count;
}

function percentage(part: number, total: number): number {
  return total > 0 ? roundHalfUp((part / total) * 100) : 0;
}

export function analyzeFlights(
  records: readonly FlightRecord[],
  options: AnalysisOptions = {},
): AnalysisResult {
  const directory = options.directory ?? DIRECTORY;
  // BA and AF feed the report lines, so they are counted whatever else is asked for
  const tracked = [...new Set([...DEFAULT_TRACKED_AIRLINES, ...(options.trackedAirlines ?? [])])];

  const totalFlights = records.length;
  let runway1Flights = 0;
  let longFlights = 0;
  let afFlights = 0;
  let rainFlights = 0;
  let delayedFlights = 0;
  const rainHours = new Set<number>();
  const destinationCounts = new Map<string, number>();
  const airlineFlights: Record<string, number> = {};
  for (const code of tracked) airlineFlights[code] = 0;

  records.forEach((flight, index) => {
    if (flight.runwayNumber === '1') runway1Flights++;
    if (parseDistance(flight.distanceMiles, index) > LONG_FLIGHT_MILES) longFlights++;

    for (const code of tracked) {
      if (flight.flightNumber.startsWith(code)) airlineFlights[code]++;
    }
    if (flight.flightNumber.startsWith('AF')) afFlights++;

    if (flight.weatherConditions.toLowerCase().includes('rain')) {
      rainFlights++;
      rainHours.add(parseDepartureHour(flight.scheduledDeparture, index));
    }

    // Any textual difference counts, early departures included
    if (flight.actualDeparture !== flight.scheduledDeparture) delayedFlights++;

    const name = directory.airportName(flight.destinationCode);
    destinationCounts.set(name, (destinationCounts.get(name) ?? 0) + 1);
  });

  const maxCount = Math.max(0, ...destinationCounts.values());
  const commonDestinations = [...destinationCounts.entries()]
    .filter(([, count]) => count === maxCount)
    .map(([name]) => name);

  return {
    totalFlights,
    runway1Flights,
    longFlights,
    airlineFlights,
    rainFlights,
    rainHoursCount: rainHours.size,
    delayedFlights,
    avgFlightsPerHour: roundHalfUp(totalFlights / OPERATING_WINDOW_HOURS),
    afPercentage: percentage(afFlights, totalFlights),
    delayedPercentage: percentage(delayedFlights, totalFlights),
    commonDestinations,
  };
}
