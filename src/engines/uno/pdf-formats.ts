import type { PdfProfile } from '../../conversion/types/conversion.types';

/**
 * LibreOffice `SelectPdfVersion` values of the archival formats it can emit
 */
const PDFA_VERSIONS: Record<string, number> = {
  'pdf/a-1a': 1,
  'pdf/a-2b': 2,
  'pdf/a-3b': 3,
};

export const SUPPORTED_PDFA_FORMATS = ['PDF/A-1a', 'PDF/A-2b', 'PDF/A-3b'];

export function pdfaVersionFor(format: string): number | null {
  return PDFA_VERSIONS[format.trim().toLowerCase()] ?? null;
}

export function isProfileSupported(profile: PdfProfile): boolean {
  return profile.pdfa === null || pdfaVersionFor(profile.pdfa) !== null;
}

/**
 * unoconv `--export` arguments for a profile. Callers check
 * isProfileSupported first.
 */
export function profileExportArgs(profile: PdfProfile): string[] {
  const args: string[] = [];

  if (profile.pdfa !== null) {
    const version = pdfaVersionFor(profile.pdfa);
    if (version !== null) {
      args.push('--export', `SelectPdfVersion=${version}`);
    }
  }

  if (profile.pdfua) {
    args.push('--export', 'UseTaggedPDF=true');
    args.push('--export', 'PDFUACompliance=true');
  }

  return args;
}
