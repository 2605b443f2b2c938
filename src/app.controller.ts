import { Body, Controller, HttpCode, Inject, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import { APP_CONFIG, AppConfig } from './config/app.config';
import { GroundTrackDto } from './dto/ground-track.dto';
import { GroundTrackResponse } from './dto/ground-track-response.dto';
import { Track } from './ground-track.types';
import { GroundTrackService } from './ground-track.service';
import { parseUtcTimestamp } from './utils/parseUtcTimestamp';
import { TrackFeatureCollection, trackToGeoJson } from './utils/trackGeoJson';

@ApiTags('ground-track')
@Controller('v01')
export class AppController {
  constructor(
    private readonly groundTrackService: GroundTrackService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Post('ground-track')
  @HttpCode(200)
  @ApiOperation({
    summary:
      'Predicts the ground track of a catalogued object, split at the antimeridian, with sparse markers',
  })
  async groundTrack(@Body() dto: GroundTrackDto): Promise<GroundTrackResponse> {
    const track = await this.build(dto);
    return this.groundTrackService.describeTrack(
      track,
      dto.markerStride ?? this.config.markerStride,
    );
  }

  @Post('ground-track/geojson')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Returns the ground track as a GeoJSON FeatureCollection of map layers',
  })
  async groundTrackGeoJson(
    @Body() dto: GroundTrackDto,
  ): Promise<TrackFeatureCollection> {
    const track = await this.build(dto);
    return trackToGeoJson(track, {
      title: dto.title,
      markerStride: dto.markerStride ?? this.config.markerStride,
    });
  }

  private build(dto: GroundTrackDto): Promise<Track> {
    // "now" is taken per request
    const start =
      dto.startTime === undefined ? new Date() : parseUtcTimestamp(dto.startTime);
    return this.groundTrackService.buildTrack(
      dto.catalogId,
      start,
      dto.forecastHours ?? this.config.forecastHours,
      dto.sampleIntervalSeconds ?? this.config.sampleIntervalSeconds,
    );
  }
}
