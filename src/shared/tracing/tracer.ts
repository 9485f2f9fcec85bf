import {
  SpanStatusCode,
  trace,
  type Attributes,
  type Span,
} from '@opentelemetry/api';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';

export const CONVERSION_TRACER_NAME = 'office-convert.workflow';

export interface TracerOptions {
  serviceName: string;
  /** OTLP/HTTP traces endpoint; tracing stays off without one */
  endpoint?: string;
  version?: string;
  environment?: string;
}

/**
 * Start the OpenTelemetry SDK for HTTP, Express and Nest spans.
 * Pipeline stages add their own spans through traceStage().
 */
export function initTracer(options: TracerOptions): NodeSDK | null {
  if (!options.endpoint) {
    return null;
  }

  const sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: options.serviceName,
      [ATTR_SERVICE_VERSION]: options.version || '1.0.0',
      'deployment.environment': options.environment || 'development',
    }),
    spanProcessors: [
      new BatchSpanProcessor(new OTLPTraceExporter({ url: options.endpoint })),
    ],
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-http': { enabled: true },
        '@opentelemetry/instrumentation-express': { enabled: true },
        '@opentelemetry/instrumentation-nestjs-core': { enabled: true },
        // Staging I/O is not traced
        '@opentelemetry/instrumentation-fs': { enabled: false },
      }),
    ],
  });

  sdk.start();
  console.log(
    `OpenTelemetry tracing for ${options.serviceName} exports to ${options.endpoint}`,
  );

  return sdk;
}

export async function shutdownTracer(sdk: NodeSDK | null): Promise<void> {
  if (sdk === null) return;
  try {
    await sdk.shutdown();
  } catch (error) {
    console.error('Error shutting down tracer:', error);
  }
}

function markFailed(span: Span, error: Error): void {
  span.recordException(error);
  span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
}

/**
 * Run one pipeline stage inside a `conversion.<stage>` span.
 * Stages may report failure through their result instead of throwing;
 * `failureOf` reads it back so the span is marked failed either way.
 */
export function traceStage<T>(
  stage: string,
  attributes: Attributes,
  run: () => Promise<T>,
  failureOf: (result: T) => Error | null | undefined = () => null,
): Promise<T> {
  return trace
    .getTracer(CONVERSION_TRACER_NAME)
    .startActiveSpan(`conversion.${stage}`, { attributes }, async (span) => {
      try {
        const result = await run();
        const failure = failureOf(result);
        if (failure) {
          markFailed(span, failure);
        }
        return result;
      } catch (error) {
        markFailed(
          span,
          error instanceof Error ? error : new Error(String(error)),
        );
        throw error;
      } finally {
        span.end();
      }
    });
}
