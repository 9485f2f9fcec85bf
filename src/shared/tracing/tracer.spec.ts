import { SpanStatusCode, trace } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { initTracer, shutdownTracer, traceStage } from './tracer';

describe('traceStage', () => {
  const exporter = new InMemorySpanExporter();

  beforeAll(() => {
    trace.setGlobalTracerProvider(
      new BasicTracerProvider({
        spanProcessors: [new SimpleSpanProcessor(exporter)],
      }),
    );
  });

  afterEach(() => {
    exporter.reset();
  });

  afterAll(() => {
    trace.disable();
  });

  it('records a span per stage with its attributes', async () => {
    const result = await traceStage(
      'render',
      { 'conversion.inputs': 2 },
      async () => 'done',
    );

    expect(result).toBe('done');
    const [span] = exporter.getFinishedSpans();
    expect(span.name).toBe('conversion.render');
    expect(span.attributes).toEqual({ 'conversion.inputs': 2 });
    expect(span.status.code).toBe(SpanStatusCode.UNSET);
  });

  it('marks the span failed when the result carries a failure', async () => {
    const update = { failure: new Error('merge failed') };

    await traceStage('merge', {}, async () => update, (u) => u.failure);

    const [span] = exporter.getFinishedSpans();
    expect(span.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: 'merge failed',
    });
    expect(span.events.map((event) => event.name)).toEqual(['exception']);
  });

  it('marks the span failed and rethrows when the stage throws', async () => {
    await expect(
      traceStage('rasterize', {}, async () => {
        throw new Error('no images');
      }),
    ).rejects.toThrow('no images');

    const [span] = exporter.getFinishedSpans();
    expect(span.name).toBe('conversion.rasterize');
    expect(span.status.code).toBe(SpanStatusCode.ERROR);
  });
});

describe('initTracer', () => {
  it('stays off without an export endpoint', async () => {
    const sdk = initTracer({ serviceName: 'office-convert-test' });

    expect(sdk).toBeNull();
    await expect(shutdownTracer(sdk)).resolves.toBeUndefined();
  });
});
