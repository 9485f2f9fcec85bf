export interface RasterOptions {
  density: string;
  quality: string;
  resize: string;
}

/**
 * Renders the pages of a PDF to image files inside `outputDir`
 */
export interface PageRasterizer {
  rasterize(
    pdfPath: string,
    outputDir: string,
    options: RasterOptions,
    signal?: AbortSignal,
  ): Promise<void>;
}
