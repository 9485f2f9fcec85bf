import type { PdfProfile } from '../../conversion/types/conversion.types';

export interface RenderOptions {
  landscape: boolean;
  pageRanges: string;
  /** Profile the renderer must emit directly, or null for a plain PDF */
  pdfFormat: PdfProfile | null;
}

/**
 * Converts one office document to one PDF
 */
export interface DocumentRenderer {
  /**
   * Lower-case file extensions (with the dot) the renderer accepts
   */
  readonly extensions: readonly string[];

  /**
   * @throws MalformedPageRangesError, PdfFormatNotAvailableError, or any
   * other error for a generic rendering failure
   */
  render(
    inputPath: string,
    outputPath: string,
    options: RenderOptions,
    signal?: AbortSignal,
  ): Promise<void>;
}
