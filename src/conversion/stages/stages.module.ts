import { Module } from '@nestjs/common';
import { EnginesModule } from '../../engines/engines.module';
import { RenderStage } from './render.stage';
import { MergeStage } from './merge.stage';
import { FormatStage } from './format.stage';
import { RasterizeStage } from './rasterize.stage';

@Module({
  imports: [EnginesModule],
  providers: [RenderStage, MergeStage, FormatStage, RasterizeStage],
  exports: [RenderStage, MergeStage, FormatStage, RasterizeStage],
})
export class StagesModule {}
