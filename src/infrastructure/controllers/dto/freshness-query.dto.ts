import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class FreshnessQueryDto {
  @ApiPropertyOptional({
    description:
      'Maximum age of newest object (format: 24h, 30m, 1d). Omit to report the newest object without an age check; an empty value means 24h.',
    example: '12h',
    pattern: '^\\d+[hmd]$',
  })
  @IsOptional()
  @IsString()
  max_age?: string;
}
