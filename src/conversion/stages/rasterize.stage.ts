/**
 * Rasterize Stage
 *
 * Turns the single active PDF into one image per page, then describes the
 * images with a metadata file read from the original document.
 * Output order: images in natural order, metadata file last.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { readdir } from 'fs/promises';
import { basename, join } from 'path';
import {
  PAGE_RASTERIZER,
  SLIDE_METADATA_EXTRACTOR,
} from '../../engines/engine.tokens';
import type {
  PageRasterizer,
  SlideMetadataExtractor,
} from '../../engines/interfaces';
import {
  AmbiguousRasterTargetError,
  MetadataExtractionFailedError,
  RasterizationFailedError,
  throwIfCancelled,
} from '../errors/conversion-errors';
import type { Artifact } from '../types/conversion.types';
import { StageContext, toStageError } from './stage.types';

const naturalOrder = new Intl.Collator(undefined, { numeric: true });

/**
 * File names of a directory (files only, no recursion) in natural order,
 * so "slide-10.jpg" sorts after "slide-9.jpg"
 */
export async function listFilesNaturally(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort(naturalOrder.compare);
}

@Injectable()
export class RasterizeStage {
  private readonly logger = new Logger(RasterizeStage.name);

  constructor(
    @Inject(PAGE_RASTERIZER) private readonly rasterizer: PageRasterizer,
    @Inject(SLIDE_METADATA_EXTRACTOR)
    private readonly metadataExtractor: SlideMetadataExtractor,
  ) {}

  async execute(
    context: StageContext,
    artifacts: Artifact[],
  ): Promise<Artifact[]> {
    const { options, signal } = context;

    if (artifacts.length !== 1) {
      throw new AmbiguousRasterTargetError(artifacts.length);
    }

    const [pdf] = artifacts;
    const documentPath = options.inputs[0];
    const startTime = Date.now();
    this.logger.log(
      `=== Rasterize Stage Start === ${pdf.name} ` +
        `(density: ${options.rasterDensity}, quality: ${options.rasterQuality}, ` +
        `resize: ${options.rasterResize})`,
    );

    const images = await this.rasterize(context, pdf);
    throwIfCancelled(signal, 'rasterize');

    let metadataPath: string;
    try {
      metadataPath = await this.metadataExtractor.extract(
        documentPath,
        images.dir,
        signal,
      );
    } catch (error) {
      throw this.fail(
        toStageError(
          error,
          'rasterize',
          signal,
          (cause) => new MetadataExtractionFailedError(documentPath, cause),
        ),
        error,
      );
    }

    this.logger.log(
      `=== Rasterize Stage Complete === ${images.names.length} image(s) ` +
        `in ${Date.now() - startTime}ms`,
    );

    return [
      ...images.names.map(
        (name): Artifact => ({
          path: join(images.dir, name),
          role: 'rasterImage',
          name,
        }),
      ),
      { path: metadataPath, role: 'metadata', name: basename(metadataPath) },
    ];
  }

  private async rasterize(
    context: StageContext,
    pdf: Artifact,
  ): Promise<{ dir: string; names: string[] }> {
    const { options, staging, signal } = context;

    try {
      const dir = await staging.createDirectory();
      await this.rasterizer.rasterize(
        pdf.path,
        dir,
        {
          density: options.rasterDensity,
          quality: options.rasterQuality,
          resize: options.rasterResize,
        },
        signal,
      );

      const names = await listFilesNaturally(dir);
      if (names.length === 0) {
        throw new Error('No images were produced');
      }
      return { dir, names };
    } catch (error) {
      throw this.fail(
        toStageError(
          error,
          'rasterize',
          signal,
          (cause) => new RasterizationFailedError(pdf.path, cause),
        ),
        error,
      );
    }
  }

  private fail<E extends Error>(failure: E, cause: unknown): E {
    this.logger.error(
      `=== Rasterize Stage Failed === ${failure.message}`,
      cause instanceof Error ? cause.stack : String(cause),
    );
    return failure;
  }
}
