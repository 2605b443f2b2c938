import { RetrievalError } from '../errors/track.errors';
import { ElementSet } from '../ground-track.types';

export const TLE_LINE_LENGTH = 69;

/**
 * TLE checksum over the first 68 characters:
 *   - sum of all digits, each '-' sign counts as 1
 *   - then mod 10
 */
export function computeChecksum(line: string): number {
  let sum = 0;
  for (const c of line.slice(0, TLE_LINE_LENGTH - 1)) {
    if (c >= '0' && c <= '9') {
      sum += parseInt(c, 10);
    } else if (c === '-') {
      sum += 1;
    }
  }
  return sum % 10;
}

/**
 * Epoch field of line 1 (columns 19-32): YYDDD.DDDDDDDD, day 1 = January 1st.
 * Two-digit years 57-99 belong to the 1900s.
 */
export function parseTleEpoch(line1: string): Date {
  const yy = parseInt(line1.substring(18, 20), 10);
  const dayOfYear = parseFloat(line1.substring(20, 32));
  if (Number.isNaN(yy) || Number.isNaN(dayOfYear)) {
    throw new RetrievalError(`Unreadable epoch in "${line1}"`);
  }
  const year = yy >= 57 ? 1900 + yy : 2000 + yy;
  return new Date(Date.UTC(year, 0, 1) + (dayOfYear - 1) * 86_400_000);
}

function checkLine(line: string, lineNumber: 1 | 2): void {
  if (line.length !== TLE_LINE_LENGTH) {
    throw new RetrievalError(
      `TLE line ${lineNumber} must be ${TLE_LINE_LENGTH} characters, got ${line.length}`,
    );
  }
  const expected = computeChecksum(line);
  const actual = parseInt(line.charAt(TLE_LINE_LENGTH - 1), 10);
  if (actual !== expected) {
    throw new RetrievalError(
      `TLE line ${lineNumber} checksum mismatch: expected ${expected}, got ${line.charAt(TLE_LINE_LENGTH - 1)}`,
    );
  }
}

/**
 * Parses a 2LE or 3LE record (optional name line, then line 1 and line 2).
 * Returns null when the text holds no element lines at all.
 *
 * @throws {RetrievalError} when the lines are present but malformed
 */
export function parseTwoLineElements(
  text: string,
  catalogId: number,
): ElementSet | null {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== '');

  const index1 = lines.findIndex((line) => line.startsWith('1 '));
  if (index1 === -1) {
    return null;
  }
  const line1 = lines[index1];
  const line2 = lines[index1 + 1];
  if (line2 === undefined || !line2.startsWith('2 ')) {
    throw new RetrievalError(`TLE line 2 missing for catalog number ${catalogId}`);
  }

  checkLine(line1, 1);
  checkLine(line2, 2);

  const number1 = parseInt(line1.substring(2, 7), 10);
  const number2 = parseInt(line2.substring(2, 7), 10);
  if (number1 !== number2) {
    throw new RetrievalError(
      `TLE lines disagree on the catalog number (${number1} / ${number2})`,
    );
  }
  if (number1 !== catalogId) {
    throw new RetrievalError(
      `Requested catalog number ${catalogId}, received ${number1}`,
    );
  }

  const name = index1 > 0 ? lines[index1 - 1].trim().replace(/^0 /, '') : '';

  return Object.freeze({
    catalogId,
    name,
    line1,
    line2,
    epoch: parseTleEpoch(line1),
  });
}
