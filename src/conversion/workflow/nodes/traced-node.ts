import { traceStage } from '../../../shared/tracing/tracer';
import type { StageName } from '../../types/conversion.types';
import type { ConversionStateType } from '../conversion-state';

type NodeFunction = (
  state: ConversionStateType,
) => Promise<Partial<ConversionStateType>>;

/**
 * Wrap a workflow node in a span for its stage.
 * A failure recorded in the state update marks the span as failed.
 */
export function tracedNode(stage: StageName, node: NodeFunction): NodeFunction {
  return (state) =>
    traceStage(
      stage,
      {
        'conversion.inputs': state.options.inputs.length,
        'conversion.active_artifacts': state.activeArtifacts.length,
      },
      () => node(state),
      (update) => update.failure,
    );
}
