import { InvalidInputError } from '../errors/track.errors';

const COMPACT = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z?$/;

/**
 * Accepts `YYYYMMDDTHHMMSS` (always UTC) or any ISO-8601 timestamp.
 */
export function parseUtcTimestamp(value: string): Date {
  const text = value.trim();
  const compact = COMPACT.exec(text);
  if (compact) {
    const [year, month, day, hour, minute, second] = compact
      .slice(1)
      .map((part) => parseInt(part, 10));
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    if (
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day ||
      date.getUTCHours() !== hour ||
      date.getUTCMinutes() !== minute ||
      date.getUTCSeconds() !== second
    ) {
      throw new InvalidInputError(`"${value}" is not a valid date`);
    }
    return date;
  }

  if (/^\d{4}-\d{2}-\d{2}/.test(text)) {
    // no offset given: UTC, not the host's zone
    const zoned = /T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(text) ? `${text}Z` : text;
    const date = new Date(zoned);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  throw new InvalidInputError(
    `"${value}" is not a timestamp (expected YYYYMMDDTHHMMSS or ISO-8601)`,
  );
}
