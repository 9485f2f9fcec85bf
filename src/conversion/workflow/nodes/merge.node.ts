import { Logger } from '@nestjs/common';
import {
  ConversionStateType,
  completeStage,
  failStage,
} from '../conversion-state';
import { MergeStage } from '../../stages/merge.stage';
import { tracedNode } from './traced-node';

const logger = new Logger('MergeNode');

export async function mergeNode(
  state: ConversionStateType,
  mergeStage: MergeStage,
): Promise<Partial<ConversionStateType>> {
  logger.log(`Executing Merge Node for ${state.activeArtifacts.length} PDFs`);

  try {
    const merged = await mergeStage.execute(
      { options: state.options, staging: state.staging, signal: state.signal },
      state.activeArtifacts,
    );

    return completeStage(state, 'merge', { activeArtifacts: [merged] });
  } catch (error) {
    logger.error(
      'Merge node failed',
      error instanceof Error ? error.stack : String(error),
    );
    return failStage('merge', error);
  }
}

export function createMergeNode(mergeStage: MergeStage) {
  return tracedNode('merge', (state) => mergeNode(state, mergeStage));
}
