import type { PdfProfile } from '../../conversion/types/conversion.types';

/**
 * Operations on existing PDF files
 */
export interface PdfEngine {
  /**
   * Merge PDFs into one, pages in the given order
   */
  merge(
    inputPaths: readonly string[],
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<void>;

  /**
   * Convert a PDF to a target profile
   * @throws PdfFormatNotAvailableError when the profile is not handled
   */
  convert(
    profile: PdfProfile,
    inputPath: string,
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<void>;
}
