/**
 * Render Stage
 *
 * First stage of the pipeline:
 * Render → Merge → Format-Convert → Rasterize → Finalize.
 * Converts every input document to one PDF, keeping input order.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DOCUMENT_RENDERER } from '../../engines/engine.tokens';
import type { DocumentRenderer } from '../../engines/interfaces';
import { mapWithConcurrency } from '../../common/utils/concurrency';
import { toPositiveInt } from '../../common/utils/config.utils';
import { fileStem } from '../../staging/file-name.utils';
import {
  RenderFailedError,
  throwIfCancelled,
} from '../errors/conversion-errors';
import type { Artifact } from '../types/conversion.types';
import { StageContext, toStageError } from './stage.types';

@Injectable()
export class RenderStage {
  private readonly logger = new Logger(RenderStage.name);
  private readonly concurrency: number;

  constructor(
    @Inject(DOCUMENT_RENDERER) private readonly renderer: DocumentRenderer,
    private readonly configService: ConfigService,
  ) {
    this.concurrency = toPositiveInt(
      this.configService.get('RENDER_CONCURRENCY'),
      1,
    );
  }

  async execute(context: StageContext): Promise<Artifact[]> {
    const { options, staging, signal } = context;
    const startTime = Date.now();
    this.logger.log(
      `=== Render Stage Start === ${options.inputs.length} document(s)`,
    );

    // The profile goes to the renderer only when it is applied natively
    const pdfFormat = options.applyFormatNatively ? options.targetFormat : null;

    try {
      const artifacts = await mapWithConcurrency(
        options.inputs,
        this.concurrency,
        async (inputPath): Promise<Artifact> => {
          throwIfCancelled(signal, 'render');

          const outputPath = staging.generatePath('.pdf');
          try {
            await this.renderer.render(
              inputPath,
              outputPath,
              {
                landscape: options.landscape,
                pageRanges: options.pageRanges,
                pdfFormat: pdfFormat ? { ...pdfFormat } : null,
              },
              signal,
            );
          } catch (error) {
            throw toStageError(
              error,
              'render',
              signal,
              (cause) => new RenderFailedError(inputPath, cause),
            );
          }

          return {
            path: outputPath,
            role: 'rendered',
            name: `${fileStem(inputPath)}.pdf`,
          };
        },
      );

      this.logger.log(
        `=== Render Stage Complete === ${artifacts.length} PDF(s) in ${Date.now() - startTime}ms`,
      );
      return artifacts;
    } catch (error) {
      this.logger.error(
        `=== Render Stage Failed === after ${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }
}
