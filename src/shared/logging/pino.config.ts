import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync, WriteStream } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'office-convert-service';
const logDir = process.env.LOG_DIR;

function requestIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string') return header;
  return 'requestId' in req && typeof req.requestId === 'string'
    ? req.requestId
    : undefined;
}

function createLogFile(dir: string): WriteStream {
  mkdirSync(dir, { recursive: true });
  return createWriteStream(join(dir, `${serviceName}.log`), { flags: 'a' });
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: requestIdOf(req),
        method: req.method,
        url: req.url,
        headers:
          process.env.NODE_ENV === 'production' ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },

    customProps: (req: IncomingMessage) => ({
      requestId: requestIdOf(req),
    }),

    // Write logs to the console (pretty) and, with LOG_DIR, a JSON file
    stream: multistream([
      {
        level: 'info',
        stream:
          process.env.NODE_ENV !== 'production'
            ? pinoPretty({
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
                singleLine: false,
              })
            : process.stdout,
      },
      ...(logDir
        ? [{ level: 'debug' as const, stream: createLogFile(logDir) }]
        : []),
    ]),
  },
};
