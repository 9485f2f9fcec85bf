export const DOCUMENT_RENDERER = 'DOCUMENT_RENDERER';
export const PDF_ENGINE = 'PDF_ENGINE';
export const PAGE_RASTERIZER = 'PAGE_RASTERIZER';
export const SLIDE_METADATA_EXTRACTOR = 'SLIDE_METADATA_EXTRACTOR';
