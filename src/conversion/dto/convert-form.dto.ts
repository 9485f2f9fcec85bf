/**
 * Convert Form DTO
 * Raw multipart form fields of POST /forms/office/convert.
 * Multipart values always arrive as strings; booleans are parsed later by
 * buildConversionOptions.
 */

import {
  IsBooleanString,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';

export class ConvertFormDto {
  @IsOptional()
  @IsBooleanString()
  landscape?: string;

  @IsOptional()
  @IsString()
  @MaxLength(1024)
  nativePageRanges?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  nativePdfFormat?: string;

  /**
   * @deprecated prefer nativePdfFormat or pdfFormat
   */
  @IsOptional()
  @IsBooleanString()
  nativePdfA1aFormat?: string;

  @IsOptional()
  @IsString()
  @MaxLength(64)
  pdfFormat?: string;

  @IsOptional()
  @IsBooleanString()
  pdfUa?: string;

  @IsOptional()
  @IsBooleanString()
  merge?: string;

  @IsOptional()
  @IsBooleanString()
  asImages?: string;

  @IsOptional()
  @IsString()
  @Matches(/^\d+(x\d+)?$/, {
    message: 'slideImageDensity must be a number of DPI, e.g. 288 or 300x300',
  })
  slideImageDensity?: string;

  @IsOptional()
  @IsString()
  @Matches(/^\d{1,3}$/, {
    message: 'slideImageQuality must be a number between 0 and 100',
  })
  slideImageQuality?: string;

  @IsOptional()
  @IsString()
  @Matches(/^[0-9.%x<>!^@]+$/, {
    message: 'slideImageResize must be an ImageMagick geometry, e.g. 50%',
  })
  slideImageResize?: string;
}
