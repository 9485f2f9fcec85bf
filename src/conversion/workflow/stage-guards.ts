/**
 * Stage entry guards and routing.
 *
 * After every node the router picks the first later stage whose guard
 * holds. Render always runs first and Finalize always runs last; a recorded
 * failure ends the run.
 */

import type { StageName } from '../types/conversion.types';
import type { ConversionStateType } from './conversion-state';

export type GuardState = Pick<
  ConversionStateType,
  'options' | 'activeArtifacts'
>;

export type StageGuard = (state: GuardState) => boolean;

export function shouldMerge(state: GuardState): boolean {
  return state.options.merge && state.activeArtifacts.length > 1;
}

export function shouldConvertFormat(state: GuardState): boolean {
  return (
    state.options.targetFormat !== null && !state.options.applyFormatNatively
  );
}

export function shouldRasterize(state: GuardState): boolean {
  return state.options.rasterize;
}

export const STAGE_ORDER: readonly StageName[] = [
  'render',
  'merge',
  'convertFormat',
  'rasterize',
  'finalize',
];

const ENTRY_GUARDS: Record<StageName, StageGuard> = {
  render: () => true,
  merge: shouldMerge,
  convertFormat: shouldConvertFormat,
  rasterize: shouldRasterize,
  finalize: () => true,
};

export const END_ROUTE = 'end';

export type Route = StageName | typeof END_ROUTE;

export function nextStage(
  state: GuardState & Pick<ConversionStateType, 'currentStage' | 'failure'>,
): Route {
  if (state.failure !== null) {
    return END_ROUTE;
  }

  const position =
    state.currentStage === 'init'
      ? -1
      : STAGE_ORDER.indexOf(state.currentStage);

  const next = STAGE_ORDER.slice(position + 1).find((stage) =>
    ENTRY_GUARDS[stage](state),
  );
  return next ?? END_ROUTE;
}
