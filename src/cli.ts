#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import * as fs from 'fs';

import { AppModule } from './app.module';
import { parseCliArguments } from './cli-arguments';
import { APP_CONFIG, AppConfig } from './config/app.config';
import { GroundTrackService } from './ground-track.service';
import { trackToGeoJson } from './utils/trackGeoJson';

const logger = new Logger('GroundTrackCli');

async function run(argv: string[]): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    const args = parseCliArguments(argv, app.get<AppConfig>(APP_CONFIG));
    const service = app.get(GroundTrackService);

    const track = await service.buildTrack(
      args.catalogId,
      args.date ?? new Date(),
      args.forecastHours,
      args.sampleIntervalSeconds,
    );
    const geoJson = trackToGeoJson(track, {
      title: args.title,
      markerStride: args.markerStride,
    });

    fs.writeFileSync(args.outPath, JSON.stringify(geoJson, null, 2), 'utf8');
    logger.log(`Wrote ${track.samples.length} samples to ${args.outPath}`);
  } finally {
    await app.close();
  }
}

run(process.argv.slice(2)).catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
