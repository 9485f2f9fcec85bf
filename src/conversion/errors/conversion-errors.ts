/**
 * Conversion Errors
 *
 * Every failure the conversion pipeline can surface is one of these classes.
 * `kind` decides how the failure reaches the client:
 * - client: 400, message and field are returned as-is
 * - server: 500, details stay in the logs
 * - cancelled: 503, the request was aborted or timed out
 */

export type ConversionErrorKind = 'client' | 'server' | 'cancelled';

/**
 * Base class for all conversion errors
 */
export abstract class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly kind: ConversionErrorKind,
    public readonly field?: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Client-input errors
 */
export class InvalidFormFieldError extends ConversionError {
  constructor(field: string, message: string) {
    super(message, 'CONVERT_INVALID_FIELD', 'client', field);
  }
}

export class AmbiguousRasterTargetError extends ConversionError {
  constructor(inputCount: number) {
    super(
      `Converting to images requires exactly one input file, got ${inputCount}`,
      'CONVERT_AMBIGUOUS_RASTER_TARGET',
      'client',
      'asImages',
    );
  }
}

export class ConflictingFormatOptionsError extends ConversionError {
  constructor(first: string, second: string) {
    super(
      `Both '${first}' and '${second}' form fields are provided`,
      'CONVERT_CONFLICTING_FORMAT_OPTIONS',
      'client',
      first,
    );
  }
}

/**
 * Adapter-classified errors, translated into client-facing messages
 */
export class MalformedPageRangesError extends ConversionError {
  constructor(pageRanges: string, cause?: unknown) {
    super(
      `Malformed page ranges '${pageRanges}' (nativePageRanges)`,
      'CONVERT_MALFORMED_PAGE_RANGES',
      'client',
      'nativePageRanges',
      cause,
    );
  }
}

export class PdfFormatNotAvailableError extends ConversionError {
  constructor(format: string, field: string, cause?: unknown) {
    super(
      `The PDF format '${format}' (${field}) is not handled by the PDF engine`,
      'CONVERT_PDF_FORMAT_NOT_AVAILABLE',
      'client',
      field,
      cause,
    );
  }
}

/**
 * Infrastructure and adapter failures
 */
export class RenderFailedError extends ConversionError {
  constructor(inputPath: string, cause?: unknown) {
    super(
      `Failed to convert ${inputPath} to PDF`,
      'CONVERT_RENDER_FAILED',
      'server',
      undefined,
      cause,
    );
  }
}

export class MergeFailedError extends ConversionError {
  constructor(count: number, cause?: unknown) {
    super(
      `Failed to merge ${count} PDFs`,
      'CONVERT_MERGE_FAILED',
      'server',
      undefined,
      cause,
    );
  }
}

export class FormatConversionFailedError extends ConversionError {
  constructor(inputPath: string, cause?: unknown) {
    super(
      `Failed to convert ${inputPath} to the requested PDF format`,
      'CONVERT_FORMAT_FAILED',
      'server',
      undefined,
      cause,
    );
  }
}

export class RasterizationFailedError extends ConversionError {
  constructor(pdfPath: string, cause?: unknown) {
    super(
      `Failed to create images from ${pdfPath}`,
      'CONVERT_RASTERIZE_FAILED',
      'server',
      undefined,
      cause,
    );
  }
}

export class MetadataExtractionFailedError extends ConversionError {
  constructor(documentPath: string, cause?: unknown) {
    super(
      `Failed to write slide data for ${documentPath}`,
      'CONVERT_METADATA_FAILED',
      'server',
      undefined,
      cause,
    );
  }
}

export class StagingError extends ConversionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONVERT_STAGING_FAILED', 'server', undefined, cause);
  }
}

export class ConversionCancelledError extends ConversionError {
  constructor(stage: string, cause?: unknown) {
    super(
      `Conversion cancelled during ${stage}`,
      'CONVERT_CANCELLED',
      'cancelled',
      undefined,
      cause,
    );
  }
}

/**
 * Throws ConversionCancelledError when the signal has been aborted
 */
export function throwIfCancelled(
  signal: AbortSignal | undefined,
  stage: string,
): void {
  if (signal?.aborted) {
    throw new ConversionCancelledError(stage, signal.reason);
  }
}
