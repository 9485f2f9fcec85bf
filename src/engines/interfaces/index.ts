export * from './document-renderer.interface';
export * from './pdf-engine.interface';
export * from './page-rasterizer.interface';
export * from './slide-metadata-extractor.interface';
