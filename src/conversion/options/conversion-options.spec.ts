import { ConvertFormDto } from '../dto/convert-form.dto';
import {
  AmbiguousRasterTargetError,
  ConflictingFormatOptionsError,
  InvalidFormFieldError,
} from '../errors/conversion-errors';
import {
  buildConversionOptions,
  parseBooleanField,
} from './conversion-options';

function form(fields: Partial<ConvertFormDto> = {}): ConvertFormDto {
  return Object.assign(new ConvertFormDto(), fields);
}

describe('parseBooleanField', () => {
  it.each([
    ['true', true],
    ['TRUE', true],
    ['1', true],
    ['false', false],
    ['0', false],
    ['', true],
    [undefined, true],
  ])('parses %p', (value, expected) => {
    expect(parseBooleanField('merge', value, true)).toBe(expected);
  });

  it('names the field in the error', () => {
    expect(() => parseBooleanField('merge', 'yes', false)).toThrow(
      new InvalidFormFieldError(
        'merge',
        "Invalid value 'yes' for 'merge': expected a boolean",
      ),
    );
  });
});

describe('buildConversionOptions', () => {
  it('applies defaults', () => {
    const { options, warnings } = buildConversionOptions(['/a.docx'], form());

    expect(options).toEqual({
      inputs: ['/a.docx'],
      landscape: false,
      pageRanges: '',
      targetFormat: null,
      applyFormatNatively: true,
      merge: false,
      rasterize: false,
      rasterDensity: '288',
      rasterQuality: '85',
      rasterResize: '50%',
    });
    expect(warnings).toEqual([]);
    expect(Object.isFrozen(options)).toBe(true);
  });

  it('requires at least one input', () => {
    expect(() => buildConversionOptions([], form())).toThrow(
      InvalidFormFieldError,
    );
  });

  it('applies nativePdfFormat natively', () => {
    const { options } = buildConversionOptions(
      ['/a.docx'],
      form({ nativePdfFormat: 'PDF/A-2b' }),
    );

    expect(options.targetFormat).toEqual({ pdfa: 'PDF/A-2b', pdfua: false });
    expect(options.applyFormatNatively).toBe(true);
  });

  it('applies pdfFormat as a separate stage', () => {
    const { options } = buildConversionOptions(
      ['/a.docx'],
      form({ pdfFormat: 'PDF/A-3b', pdfUa: 'true' }),
    );

    expect(options.targetFormat).toEqual({ pdfa: 'PDF/A-3b', pdfua: true });
    expect(options.applyFormatNatively).toBe(false);
  });

  it('applies pdfUa alone natively', () => {
    const { options } = buildConversionOptions(
      ['/a.docx'],
      form({ pdfUa: '1' }),
    );

    expect(options.targetFormat).toEqual({ pdfa: null, pdfua: true });
    expect(options.applyFormatNatively).toBe(true);
  });

  it('maps the deprecated A-1a flag and warns', () => {
    const { options, warnings } = buildConversionOptions(
      ['/a.docx'],
      form({ nativePdfA1aFormat: 'true' }),
    );

    expect(options.targetFormat).toEqual({ pdfa: 'PDF/A-1a', pdfua: false });
    expect(options.applyFormatNatively).toBe(true);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain("'nativePdfA1aFormat' is deprecated");
  });

  it.each([
    [
      { nativePdfA1aFormat: 'true', nativePdfFormat: 'PDF/A-2b' },
      'nativePdfFormat',
    ],
    [{ nativePdfA1aFormat: 'true', pdfFormat: 'PDF/A-2b' }, 'pdfFormat'],
    [{ nativePdfFormat: 'PDF/A-2b', pdfFormat: 'PDF/A-3b' }, 'pdfFormat'],
  ])('rejects conflicting format fields %p', (fields, field) => {
    expect(() => buildConversionOptions(['/a.docx'], form(fields))).toThrow(
      expect.objectContaining({
        code: 'CONVERT_CONFLICTING_FORMAT_OPTIONS',
        field,
      }),
    );
  });

  it('names both fields in the conflict message', () => {
    expect(() =>
      buildConversionOptions(
        ['/a.docx'],
        form({ nativePdfFormat: 'PDF/A-2b', pdfFormat: 'PDF/A-3b' }),
      ),
    ).toThrow(
      new ConflictingFormatOptionsError('pdfFormat', 'nativePdfFormat'),
    );
  });

  it('rejects rasterizing several inputs', () => {
    expect(() =>
      buildConversionOptions(
        ['/a.pptx', '/b.pptx'],
        form({ asImages: 'true' }),
      ),
    ).toThrow(AmbiguousRasterTargetError);
  });

  it('takes raster settings from the form', () => {
    const { options } = buildConversionOptions(
      ['/a.pptx'],
      form({
        asImages: 'true',
        slideImageDensity: '150',
        slideImageQuality: '90',
        slideImageResize: '75%',
      }),
    );

    expect(options.rasterize).toBe(true);
    expect(options.rasterDensity).toBe('150');
    expect(options.rasterQuality).toBe('90');
    expect(options.rasterResize).toBe('75%');
  });

  it('keeps inputs in request order and passes page ranges through', () => {
    const { options } = buildConversionOptions(
      ['/b.docx', '/a.docx'],
      form({ merge: 'true', landscape: '1', nativePageRanges: ' 1-2 ' }),
    );

    expect(options.inputs).toEqual(['/b.docx', '/a.docx']);
    expect(options.merge).toBe(true);
    expect(options.landscape).toBe(true);
    expect(options.pageRanges).toBe('1-2');
  });
});
