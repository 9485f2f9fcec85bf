import { basename, extname } from 'path';

const UNSAFE_CHARACTERS = /[\\/:*?"<>|\u0000-\u001f\u007f]/g;

/**
 * Reduce an uploaded file name to a safe single path segment
 */
export function sanitizeFileName(name: string, fallback = 'document'): string {
  const cleaned = basename(name.replace(/\\/g, '/'))
    .replace(UNSAFE_CHARACTERS, '_')
    .trim();

  if (cleaned.length === 0 || cleaned === '.' || cleaned === '..') {
    return fallback;
  }

  return cleaned.length > 200 ? cleaned.slice(cleaned.length - 200) : cleaned;
}

/**
 * File name without its last extension ("deck.final.pptx" → "deck.final")
 */
export function fileStem(path: string): string {
  const name = basename(path);
  const ext = extname(name);
  return ext.length > 0 ? name.slice(0, -ext.length) : name;
}
