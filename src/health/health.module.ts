import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { StagingModule } from '../staging/staging.module';

@Module({
  imports: [StagingModule],
  controllers: [HealthController],
})
export class HealthModule {}
