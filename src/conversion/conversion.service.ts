/**
 * Conversion Service
 *
 * Owns the life of one conversion request: stages the uploads, builds the
 * option set, runs the workflow and collects its outputs. The staging area
 * is removed once the response body exists, whatever the outcome.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { extname } from 'path';
import { StagingService } from '../staging/staging.service';
import { fileStem } from '../staging/file-name.utils';
import { DOCUMENT_RENDERER } from '../engines/engine.tokens';
import type { DocumentRenderer } from '../engines/interfaces';
import { ConvertFormDto } from './dto/convert-form.dto';
import { buildConversionOptions } from './options/conversion-options';
import { ConversionWorkflowService } from './workflow/conversion-workflow.service';
import {
  ConversionOutput,
  OutputCollectorService,
} from './output/output-collector.service';
import {
  InvalidFormFieldError,
  throwIfCancelled,
} from './errors/conversion-errors';

/**
 * An uploaded file, as multer hands it over
 */
export interface UploadedDocument {
  fieldname: string;
  originalname: string;
  buffer: Buffer;
}

@Injectable()
export class ConversionService {
  private readonly logger = new Logger(ConversionService.name);
  private readonly extensions: ReadonlySet<string>;

  constructor(
    private readonly stagingService: StagingService,
    private readonly workflowService: ConversionWorkflowService,
    private readonly outputCollector: OutputCollectorService,
    @Inject(DOCUMENT_RENDERER) renderer: DocumentRenderer,
  ) {
    this.extensions = new Set(renderer.extensions);
  }

  /**
   * @throws InvalidFormFieldError for unsupported files, plus anything
   * buildConversionOptions or the workflow raise
   */
  async convert(
    files: readonly UploadedDocument[],
    form: ConvertFormDto,
    signal?: AbortSignal,
  ): Promise<ConversionOutput> {
    this.assertSupported(files);

    const staging = await this.stagingService.create();
    try {
      const inputs: string[] = [];
      for (const file of files) {
        throwIfCancelled(signal, 'staging');
        inputs.push(await staging.stageUpload(file.originalname, file.buffer));
      }

      const { options, warnings } = buildConversionOptions(inputs, form);
      warnings.forEach((warning) => this.logger.warn(warning));

      const result = await this.workflowService.execute(
        options,
        staging,
        signal,
      );
      // Slide images are named after the presentation they come from
      return await this.outputCollector.collect(
        result.outputs,
        options.rasterize ? fileStem(options.inputs[0]) : undefined,
      );
    } finally {
      await this.stagingService.release(staging);
    }
  }

  private assertSupported(files: readonly UploadedDocument[]): void {
    for (const file of files) {
      const extension = extname(file.originalname).toLowerCase();
      if (!this.extensions.has(extension)) {
        throw new InvalidFormFieldError(
          file.fieldname,
          `File '${file.originalname}' has an unsupported extension ` +
            `'${extension}'`,
        );
      }
    }
  }
}
