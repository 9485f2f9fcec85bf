/**
 * Conversion Option Set
 *
 * Turns the raw form into a frozen ConversionOptions. The three historical
 * spellings of the target format are collapsed here into `targetFormat` +
 * `applyFormatNatively`, so nothing downstream reasons about aliases.
 */

import type { ConvertFormDto } from '../dto/convert-form.dto';
import type { ConversionOptions, PdfProfile } from '../types/conversion.types';
import {
  AmbiguousRasterTargetError,
  ConflictingFormatOptionsError,
  InvalidFormFieldError,
} from '../errors/conversion-errors';

export const PDF_FORMAT_A1A = 'PDF/A-1a';

// Slide image defaults: render dense, then scale down
export const DEFAULT_RASTER_DENSITY = '288';
export const DEFAULT_RASTER_QUALITY = '85';
export const DEFAULT_RASTER_RESIZE = '50%';

export interface OptionSetResult {
  options: ConversionOptions;
  warnings: string[];
}

const TRUE_VALUES = new Set(['true', '1']);
const FALSE_VALUES = new Set(['false', '0']);

/**
 * Parse a multipart boolean field
 * @throws InvalidFormFieldError on anything other than true/false/1/0
 */
export function parseBooleanField(
  field: string,
  value: string | undefined,
  defaultValue: boolean,
): boolean {
  if (value === undefined) return defaultValue;

  const normalized = value.trim().toLowerCase();
  if (normalized === '') return defaultValue;
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;

  throw new InvalidFormFieldError(
    field,
    `Invalid value '${value}' for '${field}': expected a boolean`,
  );
}

function stringField(value: string | undefined, defaultValue: string): string {
  if (value === undefined) return defaultValue;
  const trimmed = value.trim();
  return trimmed === '' ? defaultValue : trimmed;
}

/**
 * Build the option set of one request.
 *
 * @param inputs - staged input paths, in request order
 * @param form - raw form fields
 * @throws InvalidFormFieldError, ConflictingFormatOptionsError,
 * AmbiguousRasterTargetError
 */
export function buildConversionOptions(
  inputs: readonly string[],
  form: ConvertFormDto,
): OptionSetResult {
  const warnings: string[] = [];

  if (inputs.length === 0) {
    throw new InvalidFormFieldError(
      'files',
      'At least one input file is required',
    );
  }

  const landscape = parseBooleanField('landscape', form.landscape, false);
  const nativePdfA1aFormat = parseBooleanField(
    'nativePdfA1aFormat',
    form.nativePdfA1aFormat,
    false,
  );
  const pdfUa = parseBooleanField('pdfUa', form.pdfUa, false);
  const merge = parseBooleanField('merge', form.merge, false);
  const asImages = parseBooleanField('asImages', form.asImages, false);
  const nativePdfFormat = stringField(form.nativePdfFormat, '');
  const pdfFormat = stringField(form.pdfFormat, '');

  if (nativePdfA1aFormat) {
    warnings.push(
      "'nativePdfA1aFormat' is deprecated; prefer 'nativePdfFormat' or 'pdfFormat' form fields instead",
    );
  }

  if (nativePdfA1aFormat && nativePdfFormat !== '') {
    throw new ConflictingFormatOptionsError(
      'nativePdfFormat',
      'nativePdfA1aFormat',
    );
  }

  if (nativePdfA1aFormat && pdfFormat !== '') {
    throw new ConflictingFormatOptionsError('pdfFormat', 'nativePdfA1aFormat');
  }

  if (nativePdfFormat !== '' && pdfFormat !== '') {
    throw new ConflictingFormatOptionsError('pdfFormat', 'nativePdfFormat');
  }

  if (asImages && inputs.length > 1) {
    throw new AmbiguousRasterTargetError(inputs.length);
  }

  const archival = nativePdfA1aFormat
    ? PDF_FORMAT_A1A
    : nativePdfFormat || pdfFormat || null;

  const targetFormat: PdfProfile | null =
    archival !== null || pdfUa ? { pdfa: archival, pdfua: pdfUa } : null;

  // Only an explicit pdfFormat asks for a separate conversion stage
  const applyFormatNatively = pdfFormat === '';

  const options: ConversionOptions = {
    inputs: Object.freeze([...inputs]),
    landscape,
    pageRanges: stringField(form.nativePageRanges, ''),
    targetFormat: targetFormat ? Object.freeze(targetFormat) : null,
    applyFormatNatively,
    merge,
    rasterize: asImages,
    rasterDensity: stringField(form.slideImageDensity, DEFAULT_RASTER_DENSITY),
    rasterQuality: stringField(form.slideImageQuality, DEFAULT_RASTER_QUALITY),
    rasterResize: stringField(form.slideImageResize, DEFAULT_RASTER_RESIZE),
  };

  return { options: Object.freeze(options), warnings };
}
