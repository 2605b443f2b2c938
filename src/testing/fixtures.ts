import { ElementSet, ElementSetSource, GroundPoint } from '../ground-track.types';

export const TEST_LINE1 =
  '1 25544U 98067A   24100.50000000  .00016717  00000-0  30057-3 0  9992';
export const TEST_LINE2 =
  '2 25544  51.6400 200.0000 0005000  90.0000 270.0000 15.50000000440002';

export const TEST_TLE_TEXT = `TEST SAT\n${TEST_LINE1}\n${TEST_LINE2}\n`;

/** Epoch of TEST_LINE1: day 100.5 of 2024. */
export const TEST_EPOCH = new Date('2024-04-09T12:00:00.000Z');

export const TEST_ELEMENT_SET: ElementSet = Object.freeze({
  catalogId: 25544,
  name: 'TEST SAT',
  line1: TEST_LINE1,
  line2: TEST_LINE2,
  epoch: TEST_EPOCH,
});

export class StubElementSetSource implements ElementSetSource {
  readonly requested: number[] = [];

  constructor(private readonly elementSet: ElementSet = TEST_ELEMENT_SET) {}

  async fetchElements(catalogId: number): Promise<ElementSet> {
    this.requested.push(catalogId);
    return this.elementSet;
  }
}

export const points = (...longitudes: number[]): GroundPoint[] =>
  longitudes.map((longitude) => ({ latitude: 0, longitude }));
