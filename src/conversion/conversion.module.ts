import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { ConversionController } from './conversion.controller';
import { ConversionService } from './conversion.service';
import { OutputCollectorService } from './output/output-collector.service';
import { WorkflowModule } from './workflow/workflow.module';
import { StagingModule } from '../staging/staging.module';
import { EnginesModule } from '../engines/engines.module';
import { toPositiveInt } from '../common/utils/config.utils';

@Module({
  imports: [
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        limits: {
          fileSize:
            toPositiveInt(configService.get('MAX_UPLOAD_SIZE_MB'), 100) *
            1024 *
            1024,
        },
      }),
    }),
    WorkflowModule,
    StagingModule,
    EnginesModule,
  ],
  controllers: [ConversionController],
  providers: [ConversionService, OutputCollectorService],
})
export class ConversionModule {}
