import { Logger } from '@nestjs/common';
import {
  ConversionStateType,
  completeStage,
  failStage,
} from '../conversion-state';
import { FormatStage } from '../../stages/format.stage';
import { tracedNode } from './traced-node';

const logger = new Logger('ConvertFormatNode');

/**
 * Runs on the merged PDF, or on every rendered PDF when nothing was merged
 */
export async function convertFormatNode(
  state: ConversionStateType,
  formatStage: FormatStage,
): Promise<Partial<ConversionStateType>> {
  logger.log(
    `Executing Convert Format Node for ${state.activeArtifacts.length} PDF(s)`,
  );

  try {
    const converted = await formatStage.execute(
      { options: state.options, staging: state.staging, signal: state.signal },
      state.activeArtifacts,
    );

    return completeStage(state, 'convertFormat', {
      activeArtifacts: converted,
    });
  } catch (error) {
    logger.error(
      'Convert format node failed',
      error instanceof Error ? error.stack : String(error),
    );
    return failStage('convertFormat', error);
  }
}

export function createConvertFormatNode(formatStage: FormatStage) {
  return tracedNode('convertFormat', (state) => convertFormatNode(state, formatStage));
}
