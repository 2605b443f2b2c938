import { Injectable } from '@nestjs/common';
import * as satellite from 'satellite.js';

import { PropagationError } from './errors/track.errors';
import { ElementSet, GroundPoint, Propagator } from './ground-track.types';

/** Folds [-180, 180] into (-180, 180]. */
export const normalizeLongitude = (longitude: number): number =>
  longitude === -180 ? 180 : longitude;

/**
 * SGP4/SDP4 through satellite.js, reduced to the WGS-84 sub-satellite point.
 */
@Injectable()
export class SatellitePropagator implements Propagator {
  // parsed once per element set, released with it
  private readonly satrecs = new WeakMap<ElementSet, satellite.SatRec>();

  propagate(elementSet: ElementSet, instant: Date): GroundPoint {
    let position: satellite.EciVec3<number> | boolean;
    try {
      position = satellite.propagate(this.satrecFor(elementSet), instant).position;
    } catch (err) {
      throw new PropagationError(
        `SGP4 failed for ${elementSet.catalogId} at ${instant.toISOString()}`,
        { cause: err },
      );
    }

    // SGP4 errors come back as [false, false], which leaves position undefined
    if (!position || typeof position === 'boolean') {
      throw new PropagationError(
        `No position for ${elementSet.catalogId} at ${instant.toISOString()} (epoch ${elementSet.epoch.toISOString()})`,
      );
    }

    const gmst = satellite.gstime(instant);
    const geodetic = satellite.eciToGeodetic(position, gmst);
    const latitude = satellite.degreesLat(geodetic.latitude);
    const longitude = satellite.degreesLong(geodetic.longitude);

    // stale or malformed element sets come back as NaN rather than an error
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new PropagationError(
        `Invalid position for ${elementSet.catalogId} at ${instant.toISOString()}`,
      );
    }

    return { latitude, longitude: normalizeLongitude(longitude) };
  }

  private satrecFor(elementSet: ElementSet): satellite.SatRec {
    let satrec = this.satrecs.get(elementSet);
    if (satrec === undefined) {
      satrec = satellite.twoline2satrec(elementSet.line1, elementSet.line2);
      this.satrecs.set(elementSet, satrec);
    }
    return satrec;
  }
}
