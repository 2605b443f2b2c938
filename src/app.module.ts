import { Module } from '@nestjs/common';

import { AppController } from './app.controller';
import { APP_CONFIG, loadAppConfig } from './config/app.config';
import { CelestrakElementSetService } from './element-set.service';
import { ELEMENT_SET_SOURCE, PROPAGATOR } from './ground-track.types';
import { GroundTrackService } from './ground-track.service';
import { SatellitePropagator } from './propagator.service';

@Module({
  imports: [],
  controllers: [AppController],
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadAppConfig() },
    { provide: ELEMENT_SET_SOURCE, useClass: CelestrakElementSetService },
    { provide: PROPAGATOR, useClass: SatellitePropagator },
    GroundTrackService,
  ],
  exports: [GroundTrackService, APP_CONFIG],
})
export class AppModule {}
