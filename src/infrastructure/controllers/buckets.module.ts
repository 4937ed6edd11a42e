import { Module } from '@nestjs/common';
import { ApplicationModule } from '../../application/application.module';
import { BucketsController } from './buckets.controller';

@Module({
  imports: [ApplicationModule],
  controllers: [BucketsController],
})
export class BucketsModule {}
