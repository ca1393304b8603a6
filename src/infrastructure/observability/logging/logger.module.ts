import { Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { Options } from 'pino-http';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';
import { EnvConfigService } from '@infrastructure/config';
import { AppLoggerService } from './app-logger.service';

interface SerializedRequest {
  id: string;
  method: string;
  url: string;
}

interface SerializedResponse {
  statusCode: number;
}

interface RawRequest {
  id?: unknown;
  method?: string;
  url?: string;
}

type LoggingEnv = Pick<EnvConfigService, 'isProduction' | 'isTest'>;

/**
 * Builds the pino-http options: pretty output outside production,
 * a request id on every line, redacted credentials.
 */
export function buildHttpLoggerOptions(config: LoggingEnv): Options {
  const isProduction = config.isProduction;

  return {
    level: config.isTest ? 'silent' : isProduction ? 'info' : 'debug',

    transport: isProduction
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },

    genReqId: (req: IncomingMessage): string => {
      const header = req.headers['x-request-id'];
      const requestId = Array.isArray(header) ? header[0] : header;
      return requestId || randomUUID();
    },

    customProps: (req: IncomingMessage): Record<string, unknown> => ({
      userAgent: req.headers['user-agent'],
      ip: req.socket.remoteAddress,
    }),

    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie'],
      censor: '[REDACTED]',
    },

    serializers: {
      req: (req: RawRequest): SerializedRequest => ({
        id: typeof req.id === 'string' || typeof req.id === 'number' ? String(req.id) : '',
        method: req.method ?? '',
        url: req.url ?? '',
      }),
      res: (res: { statusCode: number }): SerializedResponse => ({
        statusCode: res.statusCode,
      }),
    },

    // Log level follows the response status
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err: Error | undefined,
    ): 'error' | 'warn' | 'info' => {
      if (res.statusCode >= 500 || err) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },

    customSuccessMessage: (req: IncomingMessage, res: ServerResponse): string =>
      `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} completed with ${res.statusCode}`,
    customErrorMessage: (req: IncomingMessage, _res: ServerResponse, err: Error): string =>
      `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} failed: ${err.message}`,
  };
}

export function buildPinoParams(config: LoggingEnv): Params {
  return { pinoHttp: buildHttpLoggerOptions(config) };
}

@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: buildPinoParams,
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
