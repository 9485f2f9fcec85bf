import { Logger } from '@nestjs/common';
import { ConversionStateType, completeStage } from '../conversion-state';

const logger = new Logger('FinalizeNode');

/**
 * The active artifacts become the outputs, in their current order
 */
export function finalizeNode(
  state: ConversionStateType,
): Partial<ConversionStateType> {
  logger.log(
    `Finalizing ${state.activeArtifacts.length} output(s): ` +
      state.activeArtifacts.map((artifact) => artifact.name).join(', '),
  );

  return completeStage(state, 'finalize', {
    outputs: [...state.activeArtifacts],
  });
}

export function createFinalizeNode() {
  return (state: ConversionStateType): Partial<ConversionStateType> =>
    finalizeNode(state);
}
