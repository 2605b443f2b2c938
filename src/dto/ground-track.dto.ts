import { ApiProperty } from '@nestjs/swagger';
import {
  IsDateString,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
} from 'class-validator';

import { MAX_FORECAST_HOURS } from '../utils/sampleInstants';

export class GroundTrackDto {
  @ApiProperty({
    example: 25544,
    description: 'NORAD catalog number of the object to track',
  })
  @IsInt()
  @Min(1)
  catalogId!: number;

  @ApiProperty({
    example: '2026-01-01T00:00:00Z',
    description: 'First sample instant (ISO8601, UTC). Defaults to the time of the request.',
    required: false,
  })
  @IsDateString()
  @IsOptional()
  startTime?: string;

  @ApiProperty({
    example: 1.5,
    description: `Length of the forecast window in hours, at most ${MAX_FORECAST_HOURS}. Defaults to 1.5 hours.`,
    required: false,
  })
  @IsNumber()
  @IsPositive()
  @Max(MAX_FORECAST_HOURS)
  @IsOptional()
  forecastHours?: number;

  @ApiProperty({
    example: 30,
    description: 'Whole seconds between two samples. Defaults to 30 seconds.',
    required: false,
  })
  @IsInt()
  @IsPositive()
  @IsOptional()
  sampleIntervalSeconds?: number;

  @ApiProperty({
    example: 20,
    description: 'Every Nth sample becomes a labeled marker. Defaults to 20 (10 minutes at 30 s).',
    required: false,
  })
  @IsInt()
  @Min(1)
  @IsOptional()
  markerStride?: number;

  @ApiProperty({
    example: 'ISS (ZARYA)',
    description: 'Map title, carried in the GeoJSON properties',
    required: false,
  })
  @IsString()
  @IsOptional()
  title?: string;
}
