/**
 * Describes the slides of an original document, given the directory holding
 * the images rendered from it. Returns the path of the metadata file, which
 * is written inside `imagesDir`.
 */
export interface SlideMetadataExtractor {
  extract(
    documentPath: string,
    imagesDir: string,
    signal?: AbortSignal,
  ): Promise<string>;
}
