/**
 * Output Collector
 *
 * Turns the final artifacts into a response body: the file itself when
 * there is one, a zip archive (entries in output order) otherwise.
 */

import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import JSZip from 'jszip';
import { lookup } from 'mime-types';
import type { Artifact } from '../types/conversion.types';
import { fileStem } from '../../staging/file-name.utils';

export interface ConversionOutput {
  fileName: string;
  contentType: string;
  body: Buffer;
}

const ZIP_CONTENT_TYPE = 'application/zip';
const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export function contentTypeFor(fileName: string): string {
  return lookup(fileName) || DEFAULT_CONTENT_TYPE;
}

/**
 * Make entry names unique: a repeated "report.pdf" becomes "report (1).pdf",
 * then "report (2).pdf"
 */
export function uniqueNames(names: readonly string[]): string[] {
  const taken = new Set<string>();

  return names.map((name) => {
    let candidate = name;
    for (let n = 1; taken.has(candidate); n++) {
      candidate = `${fileStem(name)} (${n})${extname(name)}`;
    }
    taken.add(candidate);
    return candidate;
  });
}

@Injectable()
export class OutputCollectorService {
  private readonly logger = new Logger(OutputCollectorService.name);

  /**
   * @param archiveStem name of the zip archive without extension; defaults
   * to the first output's stem
   */
  async collect(
    outputs: readonly Artifact[],
    archiveStem?: string,
  ): Promise<ConversionOutput> {
    if (outputs.length === 0) {
      throw new Error('The conversion produced no output');
    }

    if (outputs.length === 1) {
      const [output] = outputs;
      return {
        fileName: output.name,
        contentType: contentTypeFor(output.name),
        body: await readFile(output.path),
      };
    }

    const zip = new JSZip();
    const names = uniqueNames(outputs.map((output) => output.name));
    for (const [index, output] of outputs.entries()) {
      zip.file(names[index], await readFile(output.path));
    }

    const body = await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
    });
    const fileName = `${archiveStem ?? fileStem(outputs[0].name)}.zip`;

    this.logger.debug(
      `Archived ${outputs.length} outputs into ${fileName} (${body.length} bytes)`,
    );

    return { fileName, contentType: ZIP_CONTENT_TYPE, body };
  }
}
