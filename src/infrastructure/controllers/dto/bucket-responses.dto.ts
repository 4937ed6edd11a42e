import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  FreshnessResult,
  InspectionFailure,
  NewestObjectDescriptor,
  UsageResult,
} from '../../../domain/types/inspection.types';

export class NewestObjectDto {
  @ApiProperty({ example: 'backups/2024-05-01.tar.gz' })
  key!: string;

  @ApiProperty({ example: '2024-05-01T03:00:00.000Z' })
  last_modified!: string;

  @ApiProperty({
    example: 3900,
    description: 'Negative when the backend clock runs ahead',
  })
  age_seconds!: number;
}

export class FreshnessResponseDto {
  @ApiProperty({ enum: ['ok'] })
  status!: 'ok';

  @ApiProperty({ example: 'my-data-bucket' })
  bucket!: string;

  @ApiProperty({ type: NewestObjectDto })
  newest_object!: NewestObjectDto;

  @ApiPropertyOptional({ example: 43200 })
  max_age_seconds?: number;
}

export class UsageDto {
  @ApiProperty({ example: 1250 })
  object_count!: number;

  @ApiProperty({ example: 5368709120 })
  total_size_bytes!: number;

  @ApiProperty({ example: '5.00 GB' })
  total_size_formatted!: string;
}

export class UsageResponseDto {
  @ApiProperty({ enum: ['ok'] })
  status!: 'ok';

  @ApiProperty({ example: 'my-data-bucket' })
  bucket!: string;

  @ApiProperty({ type: UsageDto })
  usage!: UsageDto;
}

export class FailureResponseDto {
  @ApiProperty({ enum: ['fail'] })
  status!: 'fail';

  @ApiProperty({ example: "Bucket 'my-data-bucket' is empty" })
  reason!: string;

  @ApiPropertyOptional({ type: NewestObjectDto })
  newest_object?: NewestObjectDto;

  @ApiPropertyOptional({ example: 43200 })
  max_age_seconds?: number;
}

export function toNewestObjectDto(
  descriptor: NewestObjectDescriptor,
): NewestObjectDto {
  return {
    key: descriptor.key,
    last_modified: descriptor.lastModified.toISOString(),
    age_seconds: descriptor.ageSeconds,
  };
}

export function toFreshnessResponse(
  result: FreshnessResult,
): FreshnessResponseDto {
  const body: FreshnessResponseDto = {
    status: 'ok',
    bucket: result.bucket,
    newest_object: toNewestObjectDto(result.newestObject),
  };
  if (result.maxAge) body.max_age_seconds = result.maxAge.toSeconds();
  return body;
}

export function toUsageResponse(result: UsageResult): UsageResponseDto {
  return {
    status: 'ok',
    bucket: result.bucket,
    usage: {
      object_count: result.objectCount,
      total_size_bytes: result.totalSizeBytes,
      total_size_formatted: result.totalSizeFormatted,
    },
  };
}

export function toFailureResponse(
  failure: InspectionFailure,
): FailureResponseDto {
  if (failure.kind === 'StaleObject') {
    return {
      status: 'fail',
      reason: failure.reason,
      newest_object: toNewestObjectDto(failure.newestObject),
      max_age_seconds: failure.maxAgeSeconds,
    };
  }
  return { status: 'fail', reason: failure.reason };
}
