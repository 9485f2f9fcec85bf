/**
 * PDF Engine
 *
 * Merges with pdf-lib in-process and hands profile conversion to
 * LibreOffice through the unoconv renderer.
 */

import { Injectable, Logger } from '@nestjs/common';
import { readFile, writeFile } from 'fs/promises';
import { PDFDocument } from 'pdf-lib';
import type { PdfEngine } from '../interfaces/pdf-engine.interface';
import type { PdfProfile } from '../../conversion/types/conversion.types';
import { describeProfile } from '../../conversion/types/conversion.types';
import { UnoconvRenderer } from '../uno/unoconv-renderer';
import { isProfileSupported } from '../uno/pdf-formats';
import {
  PdfFormatNotAvailableError,
  throwIfCancelled,
} from '../../conversion/errors/conversion-errors';

@Injectable()
export class PdfLibEngine implements PdfEngine {
  private readonly logger = new Logger(PdfLibEngine.name);

  constructor(private readonly unoconvRenderer: UnoconvRenderer) {}

  async merge(
    inputPaths: readonly string[],
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const merged = await PDFDocument.create();

    for (const inputPath of inputPaths) {
      throwIfCancelled(signal, 'merge');

      const source = await PDFDocument.load(await readFile(inputPath));
      const pages = await merged.copyPages(source, source.getPageIndices());
      pages.forEach((page) => merged.addPage(page));
    }

    throwIfCancelled(signal, 'merge');
    await writeFile(outputPath, await merged.save());

    this.logger.debug(
      `Merged ${inputPaths.length} PDFs (${merged.getPageCount()} pages)`,
    );
  }

  async convert(
    profile: PdfProfile,
    inputPath: string,
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    if (!isProfileSupported(profile)) {
      throw new PdfFormatNotAvailableError(profile.pdfa ?? '', 'pdfFormat');
    }

    this.logger.debug(`Converting ${inputPath} to ${describeProfile(profile)}`);

    await this.unoconvRenderer.render(
      inputPath,
      outputPath,
      { landscape: false, pageRanges: '', pdfFormat: profile },
      signal,
    );
  }
}
