/**
 * Conversion Workflow State Definition
 */

import { Annotation } from '@langchain/langgraph';
import type { StagingArea } from '../../staging/staging-area';
import type {
  Artifact,
  ConversionOptions,
  StageName,
} from '../types/conversion.types';

/**
 * Workflow Metrics
 */
export interface WorkflowMetrics {
  startTime: number;
  stagesCompleted: StageName[];
}

export const ConversionState = Annotation.Root({
  // Input
  options: Annotation<ConversionOptions>,
  staging: Annotation<StagingArea>,
  signal: Annotation<AbortSignal | undefined>,

  // Files the next stage works on
  activeArtifacts: Annotation<Artifact[]>,

  // Finalize output
  outputs: Annotation<Artifact[]>,

  // Workflow metadata
  currentStage: Annotation<StageName | 'init'>,
  failure: Annotation<Error | null>,
  metrics: Annotation<WorkflowMetrics>,
});

export type ConversionStateType = typeof ConversionState.State;

export function createInitialState(input: {
  options: ConversionOptions;
  staging: StagingArea;
  signal?: AbortSignal;
}): ConversionStateType {
  return {
    options: input.options,
    staging: input.staging,
    signal: input.signal,
    activeArtifacts: [],
    outputs: [],
    currentStage: 'init',
    failure: null,
    metrics: {
      startTime: Date.now(),
      stagesCompleted: [],
    },
  };
}

/**
 * State update recording a completed stage
 */
export function completeStage(
  state: ConversionStateType,
  stage: StageName,
  update: Partial<ConversionStateType>,
): Partial<ConversionStateType> {
  return {
    ...update,
    currentStage: stage,
    metrics: {
      ...state.metrics,
      stagesCompleted: [...state.metrics.stagesCompleted, stage],
    },
  };
}

/**
 * State update recording a failed stage. Routing ends the run on it.
 */
export function failStage(
  stage: StageName,
  error: unknown,
): Partial<ConversionStateType> {
  return {
    currentStage: stage,
    failure: error instanceof Error ? error : new Error(String(error)),
  };
}
