import { Inject, Injectable, Logger } from '@nestjs/common';
import fetch from 'cross-fetch';

import { APP_CONFIG, AppConfig } from './config/app.config';
import {
  InvalidInputError,
  NotFoundError,
  RetrievalError,
} from './errors/track.errors';
import { ElementSet, ElementSetSource } from './ground-track.types';
import { parseTwoLineElements } from './utils/twoLineElements';

/**
 * Loads the current element set of one object from CelesTrak's GP endpoint.
 * Every call goes to the network; nothing is cached between tracks.
 */
@Injectable()
export class CelestrakElementSetService implements ElementSetSource {
  private readonly logger = new Logger(CelestrakElementSetService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async fetchElements(catalogId: number): Promise<ElementSet> {
    if (!Number.isInteger(catalogId) || catalogId < 1) {
      throw new InvalidInputError(
        `Catalog number must be a positive integer, got ${catalogId}`,
      );
    }

    const url = `${this.config.elementSetUrl}?CATNR=${catalogId}&FORMAT=TLE`;
    this.logger.log(`Fetching element set for ${catalogId}`);

    let body: string;
    try {
      const res = await fetch(url);
      if (!res.ok) {
        throw new RetrievalError(
          `Element set service answered HTTP ${res.status} for ${catalogId}`,
        );
      }
      body = await res.text();
    } catch (err) {
      if (err instanceof RetrievalError) {
        throw err;
      }
      throw new RetrievalError(
        `Error fetching element set for ${catalogId}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    const elementSet = parseTwoLineElements(body, catalogId);
    if (elementSet === null) {
      throw new NotFoundError(catalogId);
    }

    this.logger.debug(
      `Loaded ${elementSet.name || catalogId}, epoch ${elementSet.epoch.toISOString()}`,
    );
    return elementSet;
  }
}
