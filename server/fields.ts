import { FieldParseError } from './errors.js';

// Only the hour-colon structure matters; minutes are never read
const HOUR_RE = /^\s*(\d+):/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Integer hour before the first ":" of a departure time. */
export function parseDepartureHour(value: string, index: number): number {
  const match = value.match(HOUR_RE);
  if (!match) {
    throw new FieldParseError('scheduledDeparture', index, value, 'an HH:MM time');
  }
  return parseInt(match[1], 10);
}

export function parseDistance(value: string, index: number): number {
  const trimmed = value.trim();
  if (!DECIMAL_RE.test(trimmed)) {
    throw new FieldParseError('distanceMiles', index, value, 'a number');
  }
  return Number(trimmed);
}

/** Round half up to `digits` decimals (1.005 → 1.01). */
export function roundHalfUp(value: number, digits = 2): number {
  // Shift through the decimal string so 1.005 isn't read as 1.00499...
  if (!Number.isFinite(value) || String(value).includes('e')) {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
  }
  const shifted = Math.round(Number(`${value}e${digits}`));
  return Number(`${shifted}e-${digits}`);
}
