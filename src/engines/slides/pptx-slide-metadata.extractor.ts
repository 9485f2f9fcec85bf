/**
 * Slide Metadata Extractor
 *
 * Reads titles and speaker notes from the original presentation (an OOXML
 * package) and writes data.json next to the slide images:
 *
 *   { "title": "...", "slides": [{ "index", "title", "notes", "image" }] }
 *
 * Documents that are not presentations still get one entry per image, with
 * a generated title and no notes.
 */

import { Injectable, Logger } from '@nestjs/common';
import { readdir, readFile, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import JSZip from 'jszip';
import type { SlideMetadataExtractor } from '../interfaces/slide-metadata-extractor.interface';
import { throwIfCancelled } from '../../conversion/errors/conversion-errors';
import {
  attribute,
  child,
  children,
  createOoxmlParser,
  hasTextFrame,
  parseDocument,
  placeholderType,
  relsPathFor,
  resolveTarget,
  shapeText,
  slideShapes,
  textOf,
  type XmlNode,
} from './ooxml.utils';

export const METADATA_FILE_NAME = 'data.json';

const MAX_TITLE_LENGTH = 100;
const GENERIC_PRESENTATION_TITLE = 'PowerPoint Presentation';
const NOTES_SLIDE_RELATIONSHIP = '/notesSlide';

export interface SlideInfo {
  title: string;
  notes: string;
}

export interface SlideEntry extends SlideInfo {
  index: number;
  image: string;
}

export interface SlideMetadata {
  title: string;
  slides: SlideEntry[];
}

interface PackageInfo {
  coreTitle: string | null;
  /** null when the package holds no presentation */
  slides: SlideInfo[] | null;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Slide index encoded in an image name: "slide-3.jpg" → 3, "slide.jpg" → 0
 */
export function imageIndex(fileName: string): number {
  const ext = extname(fileName);
  const match = new RegExp(`-(\\d+)${escapeRegExp(ext)}$`).exec(fileName);
  return match ? Number(match[1]) : 0;
}

/**
 * Presentation title, falling back to the document name up to its first dot
 */
export function resolvePresentationTitle(
  coreTitle: string | null,
  documentPath: string,
): string {
  if (
    coreTitle !== null &&
    coreTitle.length > 0 &&
    coreTitle !== GENERIC_PRESENTATION_TITLE
  ) {
    return coreTitle;
  }
  return basename(documentPath).split('.')[0];
}

@Injectable()
export class PptxSlideMetadataExtractor implements SlideMetadataExtractor {
  private readonly logger = new Logger(PptxSlideMetadataExtractor.name);
  private readonly parser = createOoxmlParser();

  async extract(
    documentPath: string,
    imagesDir: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const [content, entries] = await Promise.all([
      readFile(documentPath),
      readdir(imagesDir, { withFileTypes: true }),
    ]);
    throwIfCancelled(signal, 'rasterize');

    const packageInfo = await this.readPackage(content);
    if (packageInfo.slides === null) {
      this.logger.warn(
        `${basename(documentPath)} is not a presentation, using generated slide titles`,
      );
    }

    const slides = entries
      .filter((entry) => entry.isFile() && entry.name !== METADATA_FILE_NAME)
      .map((entry): SlideEntry => {
        const index = imageIndex(entry.name);
        const info = this.slideInfoAt(packageInfo.slides, index, entry.name);
        return {
          index,
          title: info.title,
          notes: info.notes,
          image: entry.name,
        };
      })
      .sort((a, b) => a.index - b.index);

    const metadata: SlideMetadata = {
      title: resolvePresentationTitle(packageInfo.coreTitle, documentPath),
      slides,
    };

    const dataPath = join(imagesDir, METADATA_FILE_NAME);
    await writeFile(dataPath, JSON.stringify(metadata));

    this.logger.debug(`Wrote ${slides.length} slide entries to ${dataPath}`);
    return dataPath;
  }

  private slideInfoAt(
    slides: SlideInfo[] | null,
    index: number,
    image: string,
  ): SlideInfo {
    if (slides === null) {
      return { title: `Untitled ${index}`, notes: '' };
    }

    const info = slides[index];
    if (info === undefined) {
      throw new Error(
        `Image ${image} refers to slide ${index}, but the presentation has ${slides.length} slides`,
      );
    }
    return info;
  }

  /**
   * Read core properties and slides from an OOXML package.
   * Content that is not a zip archive yields an empty package.
   */
  async readPackage(content: Buffer): Promise<PackageInfo> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(content);
    } catch (error) {
      this.logger.debug(
        `Document is not an OOXML package: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { coreTitle: null, slides: null };
    }

    const coreTitle = await this.readCoreTitle(zip);
    const slides = await this.readSlides(zip);
    return { coreTitle, slides };
  }

  private async readPart(
    zip: JSZip,
    path: string,
  ): Promise<XmlNode | undefined> {
    const file = zip.file(path);
    if (file === null) return undefined;
    return parseDocument(this.parser, await file.async('string'));
  }

  private async readCoreTitle(zip: JSZip): Promise<string | null> {
    const core = await this.readPart(zip, 'docProps/core.xml');
    const title = child(child(core, 'cp:coreProperties'), 'dc:title');
    return title === undefined ? null : textOf(title);
  }

  private async readRelationships(
    zip: JSZip,
    partPath: string,
  ): Promise<{ id: string; type: string; target: string }[]> {
    const rels = await this.readPart(zip, relsPathFor(partPath));
    return children(child(rels, 'Relationships'), 'Relationship').map(
      (rel) => ({
        id: attribute(rel, 'Id') ?? '',
        type: attribute(rel, 'Type') ?? '',
        target: resolveTarget(partPath, attribute(rel, 'Target') ?? ''),
      }),
    );
  }

  private async readSlides(zip: JSZip): Promise<SlideInfo[] | null> {
    const presentationPath = 'ppt/presentation.xml';
    const presentation = await this.readPart(zip, presentationPath);
    if (presentation === undefined) return null;

    const rels = await this.readRelationships(zip, presentationPath);
    const slideIds = children(
      child(child(presentation, 'p:presentation'), 'p:sldIdLst'),
      'p:sldId',
    );

    const slides: SlideInfo[] = [];
    for (const [index, slideId] of slideIds.entries()) {
      const relId = attribute(slideId, 'r:id');
      const rel = rels.find((candidate) => candidate.id === relId);
      if (!rel) {
        slides.push({ title: `Untitled ${index}`, notes: '' });
        continue;
      }
      slides.push(await this.readSlide(zip, rel.target, index));
    }
    return slides;
  }

  private async readSlide(
    zip: JSZip,
    slidePath: string,
    index: number,
  ): Promise<SlideInfo> {
    const shapes = slideShapes(await this.readPart(zip, slidePath), 'p:sld');
    const title = this.slideTitle(shapes) ?? `Untitled ${index}`;

    const notesRel = (await this.readRelationships(zip, slidePath)).find(
      (rel) => rel.type.endsWith(NOTES_SLIDE_RELATIONSHIP),
    );
    const notes = notesRel ? await this.readNotes(zip, notesRel.target) : '';

    return { title: title.slice(0, MAX_TITLE_LENGTH), notes };
  }

  /**
   * The title placeholder's text; otherwise the first shape with text,
   * reduced to letters, digits and spaces
   */
  private slideTitle(shapes: unknown[]): string | null {
    const titleShape = shapes.find((shape) => {
      const type = placeholderType(shape);
      return type === 'title' || type === 'ctrTitle';
    });

    if (titleShape !== undefined) {
      const text = shapeText(titleShape);
      if (text.length > 0) return collapseWhitespace(text);
    }

    for (const shape of shapes) {
      if (!hasTextFrame(shape)) continue;
      const text = shapeText(shape).trim();
      if (text.length === 0) continue;

      return collapseWhitespace(text.replace(/[^0-9a-zA-Z ]+/g, ''));
    }

    return null;
  }

  private async readNotes(zip: JSZip, notesPath: string): Promise<string> {
    const shapes = slideShapes(await this.readPart(zip, notesPath), 'p:notes');
    const body = shapes.find((shape) => placeholderType(shape) === 'body');
    return body === undefined ? '' : shapeText(body).trim();
  }
}
