/**
 * DELIVERY TIME VALIDATION
 *
 * Pure checks on the instant a scheduled message becomes visible. `now` is
 * always passed in, so every rule here is testable without touching the
 * wall clock.
 */

import {Either, Left, Right} from 'purify-ts';
import {TimeError} from './types';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const YEAR = 365 * DAY;

export const MIN_LEAD_MS = MINUTE;
export const MAX_AHEAD_MS = 10 * YEAR;

// Offset is mandatory: a bare wall-clock time would be read in the server's zone
const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Accepts `candidate` when it is at least `minLeadMs` after `now`
 * (boundary inclusive) and no further ahead than `maxAheadMs`.
 */
export function validateDeliveryTime(
  candidate: Date,
  now: Date,
  minLeadMs: number = MIN_LEAD_MS,
  maxAheadMs: number = MAX_AHEAD_MS
): Either<TimeError, void> {
  if (minLeadMs <= 0) {
    throw new RangeError(`Minimum lead time must be positive, got ${minLeadMs}ms`);
  }

  const delta = candidate.getTime() - now.getTime();
  if (Number.isNaN(delta)) {
    return Left({kind: 'InvalidTime', input: String(candidate)});
  }
  if (delta < 0) {
    return Left({kind: 'PastTime', elapsedMs: -delta});
  }
  if (delta < minLeadMs) {
    return Left({kind: 'TooSoon', remainingMs: minLeadMs - delta, minLeadMs});
  }
  if (delta > maxAheadMs) {
    return Left({kind: 'TooFar', maxAheadMs});
  }
  return Right(undefined);
}

export function parseDeliveryTime(input: string): Either<TimeError, Date> {
  const trimmed = input.trim();
  if (!ISO_WITH_OFFSET.test(trimmed)) {
    return Left({kind: 'InvalidTime', input});
  }
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime())
    ? Left({kind: 'InvalidTime', input})
    : Right(parsed);
}

export function toDeliveryTime(value: Date | string): Either<TimeError, Date> {
  return typeof value === 'string' ? parseDeliveryTime(value) : Right(value);
}

// ============================================================================
// Messages
// ============================================================================

const UNITS: ReadonlyArray<readonly [number, string]> = [
  [DAY, 'day'],
  [HOUR, 'hour'],
  [MINUTE, 'minute'],
  [SECOND, 'second'],
];

/** Largest whole unit that fits, e.g. 90_000 -> "1 minute". */
export function describeSpan(ms: number): string {
  for (const [size, name] of UNITS) {
    if (ms >= size) {
      const count = Math.floor(ms / size);
      return `${count} ${name}${count === 1 ? '' : 's'}`;
    }
  }
  return '0 seconds';
}

export function formatElapsed(ms: number): string {
  return ms < SECOND ? 'moments ago' : `${describeSpan(ms)} ago`;
}

export function describeTimeError(error: TimeError): string {
  switch (error.kind) {
    case 'PastTime':
      return `Cannot schedule messages in the past (the selected time was ${formatElapsed(error.elapsedMs)}). Please select a future time.`;
    case 'TooSoon': {
      const wait = Math.ceil(error.remainingMs / SECOND) * SECOND;
      return `Message must be scheduled at least ${describeSpan(error.minLeadMs)} in the future. Please wait ${describeSpan(wait)} or select a later time.`;
    }
    case 'TooFar':
      return `Cannot schedule messages more than ${Math.round(error.maxAheadMs / YEAR)} years in the future.`;
    case 'InvalidTime':
      return `"${error.input}" is not a valid date and time. Use an ISO-8601 timestamp with a timezone offset.`;
  }
}
