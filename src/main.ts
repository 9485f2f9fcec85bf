import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { initTracer, shutdownTracer } from './shared/tracing/tracer';
import { toPositiveInt } from './common/utils/config.utils';

const serviceName = process.env.SERVICE_NAME || 'office-convert-service';
const tracer = initTracer({
  serviceName,
  endpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT,
  version: process.env.APP_VERSION,
  environment: process.env.NODE_ENV,
});

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  const port = toPositiveInt(process.env.PORT, 3000);
  await app.listen(port);
  logger.log(
    `Office conversion service is running on http://localhost:${port}`,
  );
}

void bootstrap();

process.on('SIGTERM', () => {
  void (async () => {
    await shutdownTracer(tracer);
    process.exit(0);
  })();
});

process.on('SIGINT', () => {
  void (async () => {
    await shutdownTracer(tracer);
    process.exit(0);
  })();
});
