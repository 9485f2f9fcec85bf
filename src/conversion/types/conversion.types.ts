/**
 * Conversion Types
 * Option set, PDF profile and artifact definitions shared by the workflow,
 * its stages and the engines.
 */

/**
 * Target PDF profile. `pdfa` is an archival variant such as "PDF/A-1a",
 * "PDF/A-2b" or "PDF/A-3b"; `pdfua` asks for universal accessibility.
 */
export interface PdfProfile {
  pdfa: string | null;
  pdfua: boolean;
}

/**
 * Validated, immutable parameters of one conversion
 */
export interface ConversionOptions {
  readonly inputs: readonly string[];
  readonly landscape: boolean;
  readonly pageRanges: string;
  readonly targetFormat: Readonly<PdfProfile> | null;
  readonly applyFormatNatively: boolean;
  readonly merge: boolean;
  readonly rasterize: boolean;
  readonly rasterDensity: string;
  readonly rasterQuality: string;
  readonly rasterResize: string;
}

export type ArtifactRole =
  | 'rendered'
  | 'merged'
  | 'reformatted'
  | 'rasterImage'
  | 'metadata';

/**
 * A file produced by the pipeline.
 * `name` is the file name the client receives it under.
 */
export interface Artifact {
  path: string;
  role: ArtifactRole;
  name: string;
}

export type StageName =
  | 'render'
  | 'merge'
  | 'convertFormat'
  | 'rasterize'
  | 'finalize';

/**
 * Human-readable description of a profile, e.g. "PDF/A-2b + PDF/UA"
 */
export function describeProfile(profile: PdfProfile): string {
  const parts: string[] = [];
  if (profile.pdfa) parts.push(profile.pdfa);
  if (profile.pdfua) parts.push('PDF/UA');
  return parts.join(' + ');
}
