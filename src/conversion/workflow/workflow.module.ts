import { Module } from '@nestjs/common';
import { ConversionWorkflowService } from './conversion-workflow.service';
import { StagesModule } from '../stages/stages.module';

@Module({
  imports: [StagesModule],
  providers: [ConversionWorkflowService],
  exports: [ConversionWorkflowService],
})
export class WorkflowModule {}
