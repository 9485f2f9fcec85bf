import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PDF_ENGINE } from '../../engines/engine.tokens';
import type { PdfEngine } from '../../engines/interfaces';
import { mapWithConcurrency } from '../../common/utils/concurrency';
import { toPositiveInt } from '../../common/utils/config.utils';
import {
  FormatConversionFailedError,
  throwIfCancelled,
} from '../errors/conversion-errors';
import type { Artifact, PdfProfile } from '../types/conversion.types';
import { describeProfile } from '../types/conversion.types';
import { StageContext, toStageError } from './stage.types';

/**
 * Converts every active PDF to the target profile, keeping positions
 */
@Injectable()
export class FormatStage {
  private readonly logger = new Logger(FormatStage.name);
  private readonly concurrency: number;

  constructor(
    @Inject(PDF_ENGINE) private readonly pdfEngine: PdfEngine,
    private readonly configService: ConfigService,
  ) {
    this.concurrency = toPositiveInt(
      this.configService.get('FORMAT_CONCURRENCY'),
      1,
    );
  }

  async execute(
    context: StageContext,
    artifacts: Artifact[],
  ): Promise<Artifact[]> {
    const { options, staging, signal } = context;
    if (options.targetFormat === null) {
      return artifacts;
    }

    const profile: PdfProfile = { ...options.targetFormat };
    const startTime = Date.now();
    this.logger.log(
      `=== Format Stage Start === ${artifacts.length} PDF(s) to ${describeProfile(profile)}`,
    );

    try {
      const converted = await mapWithConcurrency(
        artifacts,
        this.concurrency,
        async (artifact): Promise<Artifact> => {
          throwIfCancelled(signal, 'convertFormat');

          const outputPath = staging.generatePath('.pdf');
          try {
            await this.pdfEngine.convert(
              profile,
              artifact.path,
              outputPath,
              signal,
            );
          } catch (error) {
            throw toStageError(
              error,
              'convertFormat',
              signal,
              (cause) => new FormatConversionFailedError(artifact.path, cause),
            );
          }

          return { path: outputPath, role: 'reformatted', name: artifact.name };
        },
      );

      this.logger.log(
        `=== Format Stage Complete === ${Date.now() - startTime}ms`,
      );
      return converted;
    } catch (error) {
      this.logger.error(
        `=== Format Stage Failed === after ${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }
}
