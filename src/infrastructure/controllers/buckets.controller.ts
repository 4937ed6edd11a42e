import { Controller, Get, Param, Query } from '@nestjs/common';
import {
  ApiInternalServerErrorResponse,
  ApiBadRequestResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import {
  CheckBucketFreshnessUseCase,
} from '../../application/use-cases/check-bucket-freshness.use-case';
import {
  ReportBucketUsageUseCase,
} from '../../application/use-cases/report-bucket-usage.use-case';
import {
  BucketInspectionException,
} from '../common/bucket-inspection.exception';
import {
  InspectionMetricsService,
} from '../metrics/inspection-metrics.service';
import {
  FailureResponseDto,
  FreshnessResponseDto,
  toFreshnessResponse,
  toUsageResponse,
  UsageResponseDto,
} from './dto/bucket-responses.dto';
import { FreshnessQueryDto } from './dto/freshness-query.dto';

@ApiTags('Health Checks')
@Controller('buckets')
export class BucketsController {
  constructor(
    private readonly checkFreshness: CheckBucketFreshnessUseCase,
    private readonly reportUsage: ReportBucketUsageUseCase,
    private readonly metrics: InspectionMetricsService,
  ) {}

  @Get(':bucketName/freshness')
  @ApiOperation({
    summary: 'Check S3 Bucket Object Freshness',
    description:
      'Verifies that the bucket is accessible, contains at least one object, and that the newest object is not older than max_age.',
  })
  @ApiParam({
    name: 'bucketName',
    description: 'Name of the S3 bucket to check',
    example: 'my-data-bucket',
  })
  @ApiOkResponse({
    type: FreshnessResponseDto,
    description: 'Newest object information',
  })
  @ApiBadRequestResponse({
    type: FailureResponseDto,
    description: 'Malformed max_age',
  })
  @ApiInternalServerErrorResponse({
    type: FailureResponseDto,
    description: 'Check failed',
  })
  async freshness(
    @Param('bucketName') bucketName: string,
    @Query() query: FreshnessQueryDto,
  ): Promise<FreshnessResponseDto> {
    const result = await this.metrics.track('freshness', () =>
      this.checkFreshness.execute({ bucketName, maxAge: query.max_age }),
    );
    if (!result.ok) throw new BucketInspectionException(result.failure);
    return toFreshnessResponse(result.value);
  }

  @Get(':bucketName/usage')
  @ApiOperation({
    summary: 'Check S3 Bucket Storage Usage',
    description: 'Counts the objects in the bucket and sums their sizes.',
  })
  @ApiParam({
    name: 'bucketName',
    description: 'Name of the S3 bucket to check',
    example: 'my-data-bucket',
  })
  @ApiOkResponse({
    type: UsageResponseDto,
    description: 'Storage usage information for the bucket',
  })
  @ApiInternalServerErrorResponse({
    type: FailureResponseDto,
    description: 'Check failed',
  })
  async usage(
    @Param('bucketName') bucketName: string,
  ): Promise<UsageResponseDto> {
    const result = await this.metrics.track('usage', () =>
      this.reportUsage.execute({ bucketName }),
    );
    if (!result.ok) throw new BucketInspectionException(result.failure);
    return toUsageResponse(result.value);
  }
}
