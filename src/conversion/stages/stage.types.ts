import type { StagingArea } from '../../staging/staging-area';
import type { ConversionOptions, StageName } from '../types/conversion.types';
import { CommandAbortedError } from '../../common/process/command-runner';
import {
  ConversionCancelledError,
  ConversionError,
} from '../errors/conversion-errors';

/**
 * What every stage receives besides the artifacts it works on
 */
export interface StageContext {
  options: ConversionOptions;
  staging: StagingArea;
  signal?: AbortSignal;
}

/**
 * Map a failure raised inside a stage to a ConversionError.
 * Classified errors pass through, aborts become ConversionCancelledError and
 * anything else is handed to `wrap`.
 */
export function toStageError(
  error: unknown,
  stage: StageName,
  signal: AbortSignal | undefined,
  wrap: (cause: unknown) => ConversionError,
): ConversionError {
  if (error instanceof ConversionError) return error;
  if (error instanceof CommandAbortedError || signal?.aborted) {
    return new ConversionCancelledError(stage, error);
  }
  return wrap(error);
}
