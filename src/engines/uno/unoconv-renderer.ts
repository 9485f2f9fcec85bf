/**
 * unoconv Renderer
 *
 * Converts office documents to PDF through LibreOffice, driven by the
 * unoconv command line.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  DocumentRenderer,
  RenderOptions,
} from '../interfaces/document-renderer.interface';
import {
  CommandFailedError,
  runCommand,
} from '../../common/process/command-runner';
import { toPositiveInt } from '../../common/utils/config.utils';
import {
  MalformedPageRangesError,
  PdfFormatNotAvailableError,
} from '../../conversion/errors/conversion-errors';
import { isValidPageRanges } from './page-ranges';
import { isProfileSupported, profileExportArgs } from './pdf-formats';
import supportedExtensions from './supported-extensions.json';

/** unoconv exits with 5 when LibreOffice rejects the page selection */
export const MALFORMED_PAGE_RANGES_EXIT_CODE = 5;

@Injectable()
export class UnoconvRenderer implements DocumentRenderer {
  private readonly logger = new Logger(UnoconvRenderer.name);
  private readonly binPath: string;
  private readonly timeout: number;

  readonly extensions: readonly string[] = supportedExtensions;

  constructor(private readonly configService: ConfigService) {
    this.binPath = this.configService.get<string>(
      'UNOCONV_BIN_PATH',
      '/usr/bin/unoconv',
    );
    this.timeout = toPositiveInt(
      this.configService.get('UNOCONV_TIMEOUT_MS'),
      120000,
    );
  }

  async render(
    inputPath: string,
    outputPath: string,
    options: RenderOptions,
    signal?: AbortSignal,
  ): Promise<void> {
    if (!isValidPageRanges(options.pageRanges)) {
      throw new MalformedPageRangesError(options.pageRanges);
    }

    if (options.pdfFormat && !isProfileSupported(options.pdfFormat)) {
      throw new PdfFormatNotAvailableError(
        options.pdfFormat.pdfa ?? '',
        'nativePdfFormat',
      );
    }

    const args = this.buildArgs(inputPath, outputPath, options);
    this.logger.debug(`Running ${this.binPath} ${args.join(' ')}`);

    const result = await runCommand(this.binPath, args, {
      timeout: this.timeout,
      signal,
    });

    if (result.exitCode === 0) {
      return;
    }

    const failure = new CommandFailedError(
      [this.binPath, ...args].join(' '),
      result.exitCode,
      result.stderr,
    );

    if (
      result.exitCode === MALFORMED_PAGE_RANGES_EXIT_CODE &&
      options.pageRanges.trim() !== ''
    ) {
      throw new MalformedPageRangesError(options.pageRanges, failure);
    }

    throw failure;
  }

  buildArgs(
    inputPath: string,
    outputPath: string,
    options: RenderOptions,
  ): string[] {
    const args = ['--format', 'pdf', '--output', outputPath];

    if (options.landscape) {
      args.push('--printer', 'PaperOrientation=landscape');
    }

    const pageRanges = options.pageRanges.trim();
    if (pageRanges !== '') {
      args.push('--export', `PageRange=${pageRanges}`);
    }

    if (options.pdfFormat) {
      args.push(...profileExportArgs(options.pdfFormat));
    }

    args.push(inputPath);
    return args;
  }
}
