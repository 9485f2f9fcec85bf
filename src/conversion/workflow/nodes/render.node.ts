/**
 * Render Stage Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import {
  ConversionStateType,
  completeStage,
  failStage,
} from '../conversion-state';
import { RenderStage } from '../../stages/render.stage';
import { tracedNode } from './traced-node';

const logger = new Logger('RenderNode');

/**
 * Render Stage Node Function
 *
 * @param state - Current workflow state
 * @param renderStage - Injected RenderStage service
 * @returns Partial state update
 */
export async function renderNode(
  state: ConversionStateType,
  renderStage: RenderStage,
): Promise<Partial<ConversionStateType>> {
  logger.log(
    `Executing Render Node for ${state.options.inputs.length} input(s)`,
  );

  try {
    const rendered = await renderStage.execute({
      options: state.options,
      staging: state.staging,
      signal: state.signal,
    });

    return completeStage(state, 'render', { activeArtifacts: rendered });
  } catch (error) {
    logger.error(
      'Render node failed',
      error instanceof Error ? error.stack : String(error),
    );
    return failStage('render', error);
  }
}

/**
 * Factory function to create Render Node with injected dependencies
 */
export function createRenderNode(renderStage: RenderStage) {
  return tracedNode('render', (state) => renderNode(state, renderStage));
}
