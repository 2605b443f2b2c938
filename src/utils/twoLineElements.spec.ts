import { RetrievalError } from '../errors/track.errors';
import {
  TEST_EPOCH,
  TEST_LINE1,
  TEST_LINE2,
  TEST_TLE_TEXT,
} from '../testing/fixtures';
import {
  computeChecksum,
  parseTleEpoch,
  parseTwoLineElements,
} from './twoLineElements';

describe('computeChecksum', () => {
  it('matches the trailing digit of valid lines', () => {
    expect(computeChecksum(TEST_LINE1)).toBe(2);
    expect(computeChecksum(TEST_LINE2)).toBe(2);
  });

  it('counts minus signs as one', () => {
    expect(computeChecksum('1-1-')).toBe(4);
  });
});

describe('parseTleEpoch', () => {
  it('decodes year and fractional day of year', () => {
    expect(parseTleEpoch(TEST_LINE1)).toEqual(TEST_EPOCH);
  });

  it('maps two-digit years from 57 to the 1900s', () => {
    const line = TEST_LINE1.slice(0, 18) + '98001.25000000' + TEST_LINE1.slice(32);
    expect(parseTleEpoch(line)).toEqual(new Date('1998-01-01T06:00:00Z'));
  });
});

describe('parseTwoLineElements', () => {
  it('reads a three-line record', () => {
    const elementSet = parseTwoLineElements(TEST_TLE_TEXT, 25544);

    expect(elementSet).toEqual({
      catalogId: 25544,
      name: 'TEST SAT',
      line1: TEST_LINE1,
      line2: TEST_LINE2,
      epoch: TEST_EPOCH,
    });
    expect(Object.isFrozen(elementSet)).toBe(true);
  });

  it('reads a two-line record with CRLF endings', () => {
    const elementSet = parseTwoLineElements(`${TEST_LINE1}\r\n${TEST_LINE2}\r\n`, 25544);

    expect(elementSet?.name).toBe('');
    expect(elementSet?.line2).toBe(TEST_LINE2);
  });

  it('strips the "0 " prefix of a 3LE name line', () => {
    const elementSet = parseTwoLineElements(
      `0 TEST SAT\n${TEST_LINE1}\n${TEST_LINE2}`,
      25544,
    );

    expect(elementSet?.name).toBe('TEST SAT');
  });

  it('returns null when there are no element lines', () => {
    expect(parseTwoLineElements('No GP data found', 99999)).toBeNull();
    expect(parseTwoLineElements('', 99999)).toBeNull();
  });

  it('rejects a missing second line', () => {
    expect(() => parseTwoLineElements(TEST_LINE1, 25544)).toThrow(RetrievalError);
  });

  it('rejects a bad checksum', () => {
    const corrupted = TEST_LINE2.slice(0, 68) + '7';
    expect(() => parseTwoLineElements(`${TEST_LINE1}\n${corrupted}`, 25544)).toThrow(
      'TLE line 2 checksum mismatch: expected 2, got 7',
    );
  });

  it('rejects a truncated line', () => {
    expect(() =>
      parseTwoLineElements(`${TEST_LINE1.slice(0, 60)}\n${TEST_LINE2}`, 25544),
    ).toThrow('TLE line 1 must be 69 characters, got 60');
  });

  it('rejects an element set for another object', () => {
    expect(() => parseTwoLineElements(TEST_TLE_TEXT, 20580)).toThrow(
      'Requested catalog number 20580, received 25544',
    );
  });
});
