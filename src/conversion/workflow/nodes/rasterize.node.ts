import { Logger } from '@nestjs/common';
import {
  ConversionStateType,
  completeStage,
  failStage,
} from '../conversion-state';
import { RasterizeStage } from '../../stages/rasterize.stage';
import { tracedNode } from './traced-node';

const logger = new Logger('RasterizeNode');

export async function rasterizeNode(
  state: ConversionStateType,
  rasterizeStage: RasterizeStage,
): Promise<Partial<ConversionStateType>> {
  logger.log('Executing Rasterize Node');

  try {
    const images = await rasterizeStage.execute(
      { options: state.options, staging: state.staging, signal: state.signal },
      state.activeArtifacts,
    );

    return completeStage(state, 'rasterize', { activeArtifacts: images });
  } catch (error) {
    logger.error(
      'Rasterize node failed',
      error instanceof Error ? error.stack : String(error),
    );
    return failStage('rasterize', error);
  }
}

export function createRasterizeNode(rasterizeStage: RasterizeStage) {
  return tracedNode('rasterize', (state) => rasterizeNode(state, rasterizeStage));
}
