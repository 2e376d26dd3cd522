/**
 * Timestamp utilities for bar series
 */

import { InvalidInputError } from './errors.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse a bar timestamp into epoch milliseconds.
 *
 * Accepts "YYYY-MM-DD", "YYYY-MM-DD HH:MM[:SS]" and ISO strings. Timestamps without an
 * explicit offset are read as UTC so results do not depend on the machine's timezone.
 */
export const parseTimestamp = (timestamp: string): number => {
  const trimmed = timestamp.trim();
  let iso = trimmed;

  if (DATE_ONLY.test(trimmed)) {
    iso = `${trimmed}T00:00:00Z`;
  } else {
    iso = trimmed.replace(' ', 'T');
    if (!HAS_ZONE.test(iso)) {
      iso = `${iso}Z`;
    }
  }

  const parsed = Date.parse(iso);
  if (Number.isNaN(parsed)) {
    throw new InvalidInputError(`unrecognised timestamp "${timestamp}"`, 'timestamp');
  }
  return parsed;
};

/**
 * Inclusive date-range check. `from` and `to` are "YYYY-MM-DD"; `to` covers the whole day.
 */
export const isWithinDateRange = (epochMs: number, from?: string, to?: string): boolean => {
  if (from && epochMs < parseTimestamp(from)) {
    return false;
  }
  if (to && epochMs >= parseTimestamp(to) + 24 * 60 * 60 * 1000) {
    return false;
  }
  return true;
};

/**
 * Start of the N-minute bucket containing the timestamp, used for resampling.
 */
export const bucketStart = (epochMs: number, minutes: number): number => {
  const size = minutes * 60 * 1000;
  return Math.floor(epochMs / size) * size;
};
