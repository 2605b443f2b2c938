import { ApiProperty } from '@nestjs/swagger';

/** A labeled position along the track */
export class TrackMarker {
  @ApiProperty({ example: '2026-01-01T00:10:00.000Z' })
  time!: string;

  @ApiProperty({ example: 51.2 })
  latitude!: number;

  @ApiProperty({ example: -12.7 })
  longitude!: number;
}

/** A run of samples that can be drawn without crossing the antimeridian */
export class TrackSegment {
  @ApiProperty({ type: [Number] })
  latitudes!: number[];

  @ApiProperty({ type: [Number] })
  longitudes!: number[];
}

/** The response of /v01/ground-track */
export class GroundTrackResponse {
  @ApiProperty({ example: 25544 })
  catalogId!: number;

  @ApiProperty({ example: 'ISS (ZARYA)' })
  name!: string;

  @ApiProperty({ example: '2025-12-31T18:31:12.000Z', description: 'Element set epoch' })
  epoch!: string;

  @ApiProperty({ example: '2026-01-01T00:00:00.000Z' })
  start!: string;

  @ApiProperty({ example: 30 })
  sampleIntervalSeconds!: number;

  @ApiProperty({ type: [String], description: 'Sample instants, parallel to latitudes and longitudes' })
  times!: string[];

  @ApiProperty({ type: [Number] })
  latitudes!: number[];

  @ApiProperty({ type: [Number] })
  longitudes!: number[];

  @ApiProperty({ type: [TrackSegment], description: 'Track split at the antimeridian' })
  segments!: TrackSegment[];

  @ApiProperty({ type: [TrackMarker], description: 'Every Nth sample' })
  markers!: TrackMarker[];

  @ApiProperty({ type: TrackMarker })
  initialPosition!: TrackMarker;
}
