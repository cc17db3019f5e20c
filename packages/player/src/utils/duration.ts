/**
 * Duration formatting helpers
 */

import { ValidationError } from '../types/errors';

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3600;
const DURATION_PATTERN = /^(?:(\d+):)?(\d{1,2}):(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a duration as `H:MM:SS`
 *
 * With `removeLeadingZero` (the default) durations under an hour drop the
 * hour field, and durations under ten minutes also drop the minute padding:
 * `10` → `0:10`, `130` → `2:10`, `754` → `12:34`, `3600` → `1:00:00`.
 * Fractions of a second are floored; hours keep counting past a day.
 *
 * @throws ValidationError for negative or non-finite input
 */
export function humanizeDuration(seconds: number, removeLeadingZero = true): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ValidationError(
      `Duration must be a non-negative number of seconds, got ${seconds}`,
      undefined,
      { seconds }
    );
  }

  const total = Math.floor(seconds);
  const hours = Math.floor(total / SECONDS_PER_HOUR);
  const minutes = Math.floor((total % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const remainder = total % SECONDS_PER_MINUTE;

  if (removeLeadingZero && total < SECONDS_PER_HOUR) {
    const minuteField = total < 10 * SECONDS_PER_MINUTE ? String(minutes) : pad(minutes);
    return `${minuteField}:${pad(remainder)}`;
  }

  return `${hours}:${pad(minutes)}:${pad(remainder)}`;
}

/**
 * Parse `H:MM:SS` or `M:SS` back into whole seconds
 *
 * @throws ValidationError when the text is not a duration
 */
export function parseDuration(text: string): number {
  const match = DURATION_PATTERN.exec(text.trim());
  if (!match) {
    throw new ValidationError(`Not a duration: "${text}"`, undefined, { text });
  }

  const [, hourField, minuteField, secondField] = match;
  const hours = hourField === undefined ? 0 : Number(hourField);
  const minutes = Number(minuteField);
  const seconds = Number(secondField);

  if (seconds >= SECONDS_PER_MINUTE || (hourField !== undefined && minutes >= 60)) {
    throw new ValidationError(`Not a duration: "${text}"`, undefined, { text });
  }

  return hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds;
}
