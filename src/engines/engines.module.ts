import { Module } from '@nestjs/common';
import {
  DOCUMENT_RENDERER,
  PAGE_RASTERIZER,
  PDF_ENGINE,
  SLIDE_METADATA_EXTRACTOR,
} from './engine.tokens';
import { UnoconvRenderer } from './uno/unoconv-renderer';
import { PdfLibEngine } from './pdf/pdf-lib-engine';
import { ImageMagickRasterizer } from './imagemagick/imagemagick-rasterizer';
import { PptxSlideMetadataExtractor } from './slides/pptx-slide-metadata.extractor';

/**
 * Binds the adapter interfaces to their implementations.
 * Stages depend on the tokens only, so tests can override any of them.
 */
@Module({
  providers: [
    UnoconvRenderer,
    PdfLibEngine,
    ImageMagickRasterizer,
    PptxSlideMetadataExtractor,
    { provide: DOCUMENT_RENDERER, useExisting: UnoconvRenderer },
    { provide: PDF_ENGINE, useExisting: PdfLibEngine },
    { provide: PAGE_RASTERIZER, useExisting: ImageMagickRasterizer },
    {
      provide: SLIDE_METADATA_EXTRACTOR,
      useExisting: PptxSlideMetadataExtractor,
    },
  ],
  exports: [
    DOCUMENT_RENDERER,
    PDF_ENGINE,
    PAGE_RASTERIZER,
    SLIDE_METADATA_EXTRACTOR,
  ],
})
export class EnginesModule {}
