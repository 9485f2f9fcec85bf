/**
 * ImageMagick Rasterizer
 *
 * Renders every page of a PDF to JPEG files named slide.jpg (single page)
 * or slide-0.jpg, slide-1.jpg, ... inside the output directory.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import type {
  PageRasterizer,
  RasterOptions,
} from '../interfaces/page-rasterizer.interface';
import { runCommandOrThrow } from '../../common/process/command-runner';
import { toPositiveInt } from '../../common/utils/config.utils';

export const SLIDE_IMAGE_NAME = 'slide.jpg';

@Injectable()
export class ImageMagickRasterizer implements PageRasterizer {
  private readonly logger = new Logger(ImageMagickRasterizer.name);
  private readonly binPath: string;
  private readonly timeout: number;

  constructor(private readonly configService: ConfigService) {
    this.binPath = this.configService.get<string>(
      'IMAGEMAGICK_BIN_PATH',
      '/usr/bin/convert',
    );
    this.timeout = toPositiveInt(
      this.configService.get('IMAGEMAGICK_TIMEOUT_MS'),
      300000,
    );
  }

  async rasterize(
    pdfPath: string,
    outputDir: string,
    options: RasterOptions,
    signal?: AbortSignal,
  ): Promise<void> {
    const args = this.buildArgs(pdfPath, outputDir, options);
    this.logger.debug(`Running ${this.binPath} ${args.join(' ')}`);

    await runCommandOrThrow(this.binPath, args, {
      timeout: this.timeout,
      signal,
    });
  }

  buildArgs(
    pdfPath: string,
    outputDir: string,
    options: RasterOptions,
  ): string[] {
    return [
      '-density',
      options.density,
      pdfPath,
      '-quality',
      options.quality,
      '-resize',
      options.resize,
      join(outputDir, SLIDE_IMAGE_NAME),
    ];
  }
}
