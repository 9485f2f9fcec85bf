/**
 * Conversion Workflow Service
 *
 * Builds and runs the LangGraph.js StateGraph of the conversion pipeline:
 * Render → Merge → Format-Convert → Rasterize → Finalize.
 * Only Render and Finalize always run; the stages in between are entered
 * when their guard (see stage-guards.ts) holds.
 */

import { Injectable, Logger } from '@nestjs/common';
import { StateGraph, START, END } from '@langchain/langgraph';
import {
  ConversionState,
  ConversionStateType,
  createInitialState,
} from './conversion-state';
import { END_ROUTE, nextStage } from './stage-guards';
import {
  createConvertFormatNode,
  createFinalizeNode,
  createMergeNode,
  createRasterizeNode,
  createRenderNode,
} from './nodes';
import { RenderStage } from '../stages/render.stage';
import { MergeStage } from '../stages/merge.stage';
import { FormatStage } from '../stages/format.stage';
import { RasterizeStage } from '../stages/rasterize.stage';
import { ConversionCancelledError } from '../errors/conversion-errors';
import type { StagingArea } from '../../staging/staging-area';
import type {
  Artifact,
  ConversionOptions,
  StageName,
} from '../types/conversion.types';

export interface ConversionStages {
  render: RenderStage;
  merge: MergeStage;
  convertFormat: FormatStage;
  rasterize: RasterizeStage;
}

export interface WorkflowResult {
  outputs: Artifact[];
  metrics: {
    duration: number;
    stagesCompleted: StageName[];
  };
}

const ROUTES = {
  render: 'render',
  merge: 'merge',
  convertFormat: 'convertFormat',
  rasterize: 'rasterize',
  finalize: 'finalize',
  [END_ROUTE]: END,
} as const;

export function buildConversionGraph(stages: ConversionStages) {
  return new StateGraph(ConversionState)
    .addNode('render', createRenderNode(stages.render))
    .addNode('merge', createMergeNode(stages.merge))
    .addNode('convertFormat', createConvertFormatNode(stages.convertFormat))
    .addNode('rasterize', createRasterizeNode(stages.rasterize))
    .addNode('finalize', createFinalizeNode())
    .addEdge(START, 'render')
    .addConditionalEdges('render', nextStage, ROUTES)
    .addConditionalEdges('merge', nextStage, ROUTES)
    .addConditionalEdges('convertFormat', nextStage, ROUTES)
    .addConditionalEdges('rasterize', nextStage, ROUTES)
    .addEdge('finalize', END)
    .compile();
}

export type ConversionGraph = ReturnType<typeof buildConversionGraph>;

/**
 * Type guard to validate workflow result matches expected state type
 */
function isConversionStateType(value: unknown): value is ConversionStateType {
  if (!value || typeof value !== 'object') {
    return false;
  }

  return (
    'outputs' in value &&
    Array.isArray(value.outputs) &&
    'currentStage' in value &&
    typeof value.currentStage === 'string' &&
    'failure' in value &&
    'metrics' in value &&
    typeof value.metrics === 'object' &&
    value.metrics !== null
  );
}

@Injectable()
export class ConversionWorkflowService {
  private readonly logger = new Logger(ConversionWorkflowService.name);
  private readonly workflow: ConversionGraph;

  constructor(
    renderStage: RenderStage,
    mergeStage: MergeStage,
    formatStage: FormatStage,
    rasterizeStage: RasterizeStage,
  ) {
    this.logger.log('Initializing LangGraph conversion workflow...');
    this.workflow = buildConversionGraph({
      render: renderStage,
      merge: mergeStage,
      convertFormat: formatStage,
      rasterize: rasterizeStage,
    });
  }

  /**
   * Run the pipeline for one request.
   * Nothing is returned unless every entered stage succeeded.
   *
   * @throws the ConversionError recorded by the failing stage, or
   * ConversionCancelledError when `signal` aborts the run
   */
  async execute(
    options: ConversionOptions,
    staging: StagingArea,
    signal?: AbortSignal,
  ): Promise<WorkflowResult> {
    const startTime = Date.now();
    this.logger.log(
      `Starting conversion workflow for ${options.inputs.length} input(s) ` +
        `(merge: ${options.merge}, rasterize: ${options.rasterize})`,
    );

    let result: unknown;
    try {
      result = await this.workflow.invoke(
        createInitialState({ options, staging, signal }),
        { signal },
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new ConversionCancelledError('workflow', error);
      }
      this.logger.error(
        `Workflow execution failed (${Date.now() - startTime}ms)`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }

    if (!isConversionStateType(result)) {
      throw new Error('Workflow returned invalid state type');
    }

    const duration = Date.now() - startTime;
    const stagesCompleted = result.metrics.stagesCompleted;

    if (result.failure !== null) {
      this.logger.warn(
        `Workflow failed at ${result.currentStage} (${duration}ms): ${result.failure.message}`,
      );
      throw result.failure;
    }

    this.logger.log(
      `Workflow completed: ${result.outputs.length} output(s) ` +
        `(${duration}ms, stages: ${stagesCompleted.join(' → ')})`,
    );

    return {
      outputs: result.outputs,
      metrics: { duration, stagesCompleted },
    };
  }
}
