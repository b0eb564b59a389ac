// =============================================================================
// Error taxonomy
//
//   SourceNotFound        — not an error class: the loader recovers with an
//                           empty record list and reports status 'not-found'
//   MalformedRecordError  — row lacks a field the header promises
//   FieldParseError       — field present but not of its semantic type
//   UnknownAirlineCode    — rejection value from the histogram binner
//   ReportWriteError      — results file not writable; logged, never thrown
// =============================================================================

export type FlightField =
  | 'runwayNumber'
  | 'distanceMiles'
  | 'flightNumber'
  | 'weatherConditions'
  | 'scheduledDeparture'
  | 'actualDeparture'
  | 'destinationCode';

/** Bad input data. Halts the current pass; carries the offending field and row. */
export class FlightDataError extends Error {
  readonly field: FlightField;
  readonly index: number;

  constructor(message: string, field: FlightField, index: number) {
    super(message);
    this.name = 'FlightDataError';
    this.field = field;
    this.index = index;
  }
}

export class MalformedRecordError extends FlightDataError {
  readonly column: string;

  constructor(column: string, field: FlightField, index: number) {
    super(`Record ${index} is missing field "${column}"`, field, index);
    this.name = 'MalformedRecordError';
    this.column = column;
  }
}

export class FieldParseError extends FlightDataError {
  readonly value: string;

  constructor(field: FlightField, index: number, value: string, expected: string) {
    super(`Record ${index}: ${field} "${value}" is not ${expected}`, field, index);
    this.name = 'FieldParseError';
    this.value = value;
  }
}

export class ReportWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error saving results to ${path}: ${reason}`, { cause });
    this.name = 'ReportWriteError';
    this.path = path;
  }
}

export function isFlightDataError(err: unknown): err is FlightDataError {
  return err instanceof FlightDataError;
}
