import { Inject, Injectable, Logger } from '@nestjs/common';
import { PDF_ENGINE } from '../../engines/engine.tokens';
import type { PdfEngine } from '../../engines/interfaces';
import { MergeFailedError } from '../errors/conversion-errors';
import type { Artifact } from '../types/conversion.types';
import { StageContext, toStageError } from './stage.types';

export const MERGED_FILE_NAME = 'merged.pdf';

/**
 * Combines the rendered PDFs into one, pages in input order
 */
@Injectable()
export class MergeStage {
  private readonly logger = new Logger(MergeStage.name);

  constructor(@Inject(PDF_ENGINE) private readonly pdfEngine: PdfEngine) {}

  async execute(
    context: StageContext,
    artifacts: Artifact[],
  ): Promise<Artifact> {
    const { staging, signal } = context;
    const startTime = Date.now();
    this.logger.log(`=== Merge Stage Start === ${artifacts.length} PDFs`);

    const outputPath = staging.generatePath('.pdf');
    try {
      await this.pdfEngine.merge(
        artifacts.map((artifact) => artifact.path),
        outputPath,
        signal,
      );
    } catch (error) {
      const failure = toStageError(
        error,
        'merge',
        signal,
        (cause) => new MergeFailedError(artifacts.length, cause),
      );
      this.logger.error(
        `=== Merge Stage Failed === ${failure.message}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw failure;
    }

    this.logger.log(
      `=== Merge Stage Complete === ${Date.now() - startTime}ms`,
    );
    return { path: outputPath, role: 'merged', name: MERGED_FILE_NAME };
  }
}
