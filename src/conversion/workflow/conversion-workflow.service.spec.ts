import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { ConversionWorkflowService } from './conversion-workflow.service';
import { RenderStage } from '../stages/render.stage';
import { MergeStage } from '../stages/merge.stage';
import { FormatStage } from '../stages/format.stage';
import { RasterizeStage } from '../stages/rasterize.stage';
import { ConvertFormDto } from '../dto/convert-form.dto';
import { buildConversionOptions } from '../options/conversion-options';
import {
  ConversionCancelledError,
  FormatConversionFailedError,
  MalformedPageRangesError,
  MergeFailedError,
  MetadataExtractionFailedError,
  PdfFormatNotAvailableError,
  RasterizationFailedError,
  RenderFailedError,
} from '../errors/conversion-errors';
import { StagingArea } from '../../staging/staging-area';
import {
  FakePdfEngine,
  FakeRasterizer,
  FakeRenderer,
  FakeSlideMetadataExtractor,
} from '../../testing/fake-engines';

describe('ConversionWorkflowService', () => {
  let staging: StagingArea;
  let renderer: FakeRenderer;
  let pdfEngine: FakePdfEngine;
  let rasterizer: FakeRasterizer;
  let extractor: FakeSlideMetadataExtractor;

  beforeEach(async () => {
    staging = new StagingArea(await mkdtemp(join(tmpdir(), 'workflow-spec-')));
    renderer = new FakeRenderer();
    pdfEngine = new FakePdfEngine();
    rasterizer = new FakeRasterizer();
    extractor = new FakeSlideMetadataExtractor();
  });

  afterEach(async () => {
    await staging.dispose();
  });

  function createService(
    config: Record<string, string> = {},
  ): ConversionWorkflowService {
    const configService = new ConfigService(config);
    return new ConversionWorkflowService(
      new RenderStage(renderer, configService),
      new MergeStage(pdfEngine),
      new FormatStage(pdfEngine, configService),
      new RasterizeStage(rasterizer, extractor),
    );
  }

  async function stageInputs(names: string[]): Promise<string[]> {
    const paths: string[] = [];
    for (const name of names) {
      paths.push(await staging.stageUpload(name, Buffer.from(name)));
    }
    return paths;
  }

  function optionsFor(inputs: string[], fields: Partial<ConvertFormDto>) {
    return buildConversionOptions(
      inputs,
      Object.assign(new ConvertFormDto(), fields),
    ).options;
  }

  it('renders a single document without merging it', async () => {
    const inputs = await stageInputs(['report.docx']);

    const result = await createService().execute(
      optionsFor(inputs, { merge: 'true' }),
      staging,
    );

    expect(pdfEngine.mergeCalls).toHaveLength(0);
    expect(renderer.calls).toEqual([
      {
        inputPath: inputs[0],
        options: { landscape: false, pageRanges: '', pdfFormat: null },
      },
    ]);
    expect(result.outputs).toEqual([
      { path: expect.any(String), role: 'rendered', name: 'report.pdf' },
    ]);
    expect(await readFile(result.outputs[0].path, 'utf8')).toBe(
      'pdf:report.docx',
    );
    expect(result.metrics.stagesCompleted).toEqual(['render', 'finalize']);
  });

  it('converts each rendered PDF and keeps input order', async () => {
    const inputs = await stageInputs(['a.docx', 'b.docx', 'c.docx']);
    renderer.delays.set('a.docx', 30);
    pdfEngine.convertDelays = [30, 10, 0];

    const result = await createService({
      RENDER_CONCURRENCY: '3',
      FORMAT_CONCURRENCY: '3',
    }).execute(optionsFor(inputs, { pdfFormat: 'PDF/A-2b' }), staging);

    expect(renderer.calls.map((call) => call.options.pdfFormat)).toEqual([
      null,
      null,
      null,
    ]);
    expect(pdfEngine.convertCalls).toHaveLength(3);
    for (const call of pdfEngine.convertCalls) {
      expect(call.profile).toEqual({ pdfa: 'PDF/A-2b', pdfua: false });
    }

    const renderedContents = await Promise.all(
      pdfEngine.convertCalls.map((call) => readFile(call.inputPath, 'utf8')),
    );
    expect(renderedContents).toEqual([
      'pdf:a.docx',
      'pdf:b.docx',
      'pdf:c.docx',
    ]);

    expect(result.outputs.map((output) => output.name)).toEqual([
      'a.pdf',
      'b.pdf',
      'c.pdf',
    ]);
    expect(result.outputs.map((output) => output.role)).toEqual([
      'reformatted',
      'reformatted',
      'reformatted',
    ]);
    const outputContents = await Promise.all(
      result.outputs.map((output) => readFile(output.path, 'utf8')),
    );
    expect(outputContents).toEqual(
      pdfEngine.convertCalls.map(
        (call) => `converted:${basename(call.inputPath)}`,
      ),
    );
    expect(result.metrics.stagesCompleted).toEqual([
      'render',
      'convertFormat',
      'finalize',
    ]);
  });

  it('merges before converting the format once', async () => {
    const inputs = await stageInputs(['a.docx', 'b.odt']);

    const result = await createService().execute(
      optionsFor(inputs, { merge: 'true', pdfFormat: 'PDF/A-3b' }),
      staging,
    );

    expect(pdfEngine.mergeCalls).toHaveLength(1);
    expect(pdfEngine.mergeCalls[0]).toHaveLength(2);
    expect(pdfEngine.convertCalls).toHaveLength(1);
    expect(
      await readFile(pdfEngine.convertCalls[0].inputPath, 'utf8'),
    ).toBe('merged:2');
    expect(result.outputs).toEqual([
      { path: expect.any(String), role: 'reformatted', name: 'merged.pdf' },
    ]);
    expect(result.metrics.stagesCompleted).toEqual([
      'render',
      'merge',
      'convertFormat',
      'finalize',
    ]);
  });

  it('hands a native profile to the renderer only', async () => {
    const inputs = await stageInputs(['a.docx']);

    await createService().execute(
      optionsFor(inputs, { nativePdfA1aFormat: 'true', pdfUa: 'true' }),
      staging,
    );

    expect(renderer.calls[0].options.pdfFormat).toEqual({
      pdfa: 'PDF/A-1a',
      pdfua: true,
    });
    expect(pdfEngine.convertCalls).toHaveLength(0);
  });

  it('rasterizes with the requested settings, metadata last', async () => {
    const inputs = await stageInputs(['deck.pptx']);
    rasterizer = new FakeRasterizer([
      'slide-10.jpg',
      'slide-2.jpg',
      'slide-1.jpg',
    ]);

    const result = await createService().execute(
      optionsFor(inputs, {
        asImages: 'true',
        slideImageDensity: '150',
        slideImageQuality: '90',
        slideImageResize: '75%',
      }),
      staging,
    );

    expect(rasterizer.calls).toHaveLength(1);
    expect(rasterizer.calls[0].options).toEqual({
      density: '150',
      quality: '90',
      resize: '75%',
    });
    expect(extractor.documents).toEqual(inputs);
    expect(result.outputs.map((output) => [output.name, output.role])).toEqual(
      [
        ['slide-1.jpg', 'rasterImage'],
        ['slide-2.jpg', 'rasterImage'],
        ['slide-10.jpg', 'rasterImage'],
        ['data.json', 'metadata'],
      ],
    );
    expect(result.metrics.stagesCompleted).toEqual([
      'render',
      'rasterize',
      'finalize',
    ]);
  });

  it('fails without outputs when a render fails', async () => {
    const inputs = await stageInputs(['a.docx', 'b.docx']);
    renderer.failWith = (inputPath) =>
      inputPath.endsWith('b.docx') ? new Error('soffice crashed') : null;

    const run = createService().execute(
      optionsFor(inputs, { merge: 'true' }),
      staging,
    );

    await expect(run).rejects.toBeInstanceOf(RenderFailedError);
    await expect(run).rejects.toMatchObject({
      code: 'CONVERT_RENDER_FAILED',
      cause: new Error('soffice crashed'),
    });
    expect(pdfEngine.mergeCalls).toHaveLength(0);
  });

  it('passes classified renderer errors through', async () => {
    const inputs = await stageInputs(['a.docx']);
    renderer.failWith = () => new MalformedPageRangesError('9-1');

    await expect(
      createService().execute(optionsFor(inputs, {}), staging),
    ).rejects.toBeInstanceOf(MalformedPageRangesError);
  });

  it('fails when rasterization produces no images', async () => {
    const inputs = await stageInputs(['deck.pptx']);
    rasterizer = new FakeRasterizer([]);

    await expect(
      createService().execute(
        optionsFor(inputs, { asImages: 'true' }),
        staging,
      ),
    ).rejects.toBeInstanceOf(RasterizationFailedError);
    expect(extractor.documents).toEqual([]);
  });

  it('reports a failed merge without converting the format', async () => {
    const inputs = await stageInputs(['a.docx', 'b.docx']);
    pdfEngine.mergeFailure = new Error('xref table broken');

    const run = createService().execute(
      optionsFor(inputs, { merge: 'true', pdfFormat: 'PDF/A-2b' }),
      staging,
    );

    await expect(run).rejects.toBeInstanceOf(MergeFailedError);
    await expect(run).rejects.toMatchObject({
      code: 'CONVERT_MERGE_FAILED',
      kind: 'server',
      cause: new Error('xref table broken'),
    });
    expect(pdfEngine.mergeCalls).toHaveLength(1);
    expect(pdfEngine.convertCalls).toHaveLength(0);
  });

  it('keeps an unavailable profile a client error after rendering', async () => {
    const inputs = await stageInputs(['a.docx']);
    pdfEngine.convertFailure = new PdfFormatNotAvailableError(
      'PDF/A-2b',
      'pdfFormat',
    );

    const run = createService().execute(
      optionsFor(inputs, { pdfFormat: 'PDF/A-2b' }),
      staging,
    );

    await expect(run).rejects.toBeInstanceOf(PdfFormatNotAvailableError);
    await expect(run).rejects.toMatchObject({
      kind: 'client',
      field: 'pdfFormat',
    });
  });

  it('reports other format conversion failures as server errors', async () => {
    const inputs = await stageInputs(['a.docx']);
    pdfEngine.convertFailure = new Error('ghostscript crashed');

    const run = createService().execute(
      optionsFor(inputs, { pdfFormat: 'PDF/A-2b' }),
      staging,
    );

    await expect(run).rejects.toBeInstanceOf(FormatConversionFailedError);
    await expect(run).rejects.toMatchObject({
      code: 'CONVERT_FORMAT_FAILED',
      kind: 'server',
      cause: new Error('ghostscript crashed'),
    });
  });

  it('reports a failed slide data extraction', async () => {
    const inputs = await stageInputs(['deck.pptx']);
    extractor.failure = new Error('presentation.xml missing');

    const run = createService().execute(
      optionsFor(inputs, { asImages: 'true' }),
      staging,
    );

    await expect(run).rejects.toBeInstanceOf(MetadataExtractionFailedError);
    await expect(run).rejects.toMatchObject({
      code: 'CONVERT_METADATA_FAILED',
      cause: new Error('presentation.xml missing'),
    });
    expect(rasterizer.calls).toHaveLength(1);
    expect(extractor.documents).toEqual(inputs);
  });

  it('stops at the running call when the signal aborts mid-render', async () => {
    const inputs = await stageInputs(['a.docx', 'b.docx']);
    const controller = new AbortController();
    renderer.onRender = () => controller.abort();

    await expect(
      createService().execute(
        optionsFor(inputs, { merge: 'true', pdfFormat: 'PDF/A-2b' }),
        staging,
        controller.signal,
      ),
    ).rejects.toBeInstanceOf(ConversionCancelledError);
    expect(renderer.calls.map((call) => call.inputPath)).toEqual([inputs[0]]);
    expect(pdfEngine.mergeCalls).toHaveLength(0);
    expect(pdfEngine.convertCalls).toHaveLength(0);
  });

  it('does not render anything once the signal is aborted', async () => {
    const inputs = await stageInputs(['a.docx']);
    const controller = new AbortController();
    controller.abort();

    await expect(
      createService().execute(
        optionsFor(inputs, {}),
        staging,
        controller.signal,
      ),
    ).rejects.toBeInstanceOf(ConversionCancelledError);
    expect(renderer.calls).toHaveLength(0);
  });
});
