import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'response-cache-service';
const logDir = process.env.LOG_DIR;

function headerString(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
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

  // JSON file output for log shippers, only when a directory is configured
  if (logDir) {
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
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
        'req.headers["x-gateway-auth"]',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = req.url || '';
        return url === '/cache/health' || url === '/health';
      },
    },

    genReqId: (req: IncomingMessage) =>
      headerString(req, 'x-request-id') ?? `req-${uuidv4()}`,

    customProps: (req: IncomingMessage) => ({
      requestId: headerString(req, 'x-request-id') ?? req.id,
      userId: headerString(req, 'x-user-id'),
    }),

    stream: multistream(buildStreams()),
  },
};
