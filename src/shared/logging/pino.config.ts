import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';

const serviceName = process.env.SERVICE_NAME || 'rag-relay-server';
const logDir = process.env.LOG_DIR;

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
    // Console output with pretty formatting
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
  ];

  // File output with JSON formatting, only when a log directory is configured
  if (logDir) {
    mkdirSync(logDir, { recursive: true });
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-sign"]',
        'token',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
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
      ignore: (req: IncomingMessage) => {
        const url = req.url || '';
        return url === '/api/health';
      },
    },

    genReqId: (req: IncomingMessage) =>
      headerValue(req, 'x-request-id') ?? `req-${randomUUID()}`,

    customProps: (req: IncomingMessage) => ({
      requestId: headerValue(req, 'x-request-id') ?? req.id,
    }),

    stream: multistream(buildStreams()),
  },
};
