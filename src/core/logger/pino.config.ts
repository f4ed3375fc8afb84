import { Params } from 'nestjs-pino';
import * as pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { IncomingMessage, IncomingHttpHeaders } from 'http';

export const SERVICE_NAME = 'tweets-service';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

export const DEFAULT_LOG_FILE_PATH = './logs/application.log';

export type LogFormat = 'pretty' | 'json';

export interface LoggerSettings {
  environment: string;
  level: string;
  format: LogFormat;
  /** Also write to `filePath`, next to stdout. */
  fileEnabled: boolean;
  filePath: string;
}

type Transport = pino.TransportSingleOptions | pino.TransportMultiOptions;

interface SerializedRequest {
  id?: string | number;
  method?: string;
  url?: string;
  remoteAddress?: string;
  headers: IncomingHttpHeaders;
}

interface SerializedResponse {
  statusCode: number;
}

/**
 * First value of a header that may have been sent more than once.
 */
export function firstHeaderValue(
  value: string | string[] | undefined,
): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Reads LOG_* settings. Outside production the defaults are debug level
 * and pretty output.
 */
export function resolveLoggerSettings(
  env: NodeJS.ProcessEnv = process.env,
): LoggerSettings {
  const environment = env.NODE_ENV ?? 'development';
  const isProduction = environment === 'production';

  return {
    environment,
    level: env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
    format:
      env.LOG_FORMAT === 'json' || env.LOG_FORMAT === 'pretty'
        ? env.LOG_FORMAT
        : isProduction
          ? 'json'
          : 'pretty',
    fileEnabled: env.LOG_ENABLE_FILE === 'true',
    filePath: env.LOG_FILE_PATH ?? DEFAULT_LOG_FILE_PATH,
  };
}

export function buildTransport(settings: LoggerSettings): Transport | undefined {
  if (settings.format === 'pretty' && settings.environment !== 'production') {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{service}[{context}]: {msg}',
      },
    };
  }

  if (settings.fileEnabled) {
    return {
      targets: [
        {
          target: 'pino/file',
          level: settings.level,
          options: { destination: 1 },
        },
        {
          target: 'pino/file',
          level: settings.level,
          options: { destination: settings.filePath, append: true, mkdir: true },
        },
      ],
    };
  }

  return undefined;
}

export function createLoggerOptions(
  settings: LoggerSettings,
): pino.LoggerOptions {
  const options: pino.LoggerOptions = {
    level: settings.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: SERVICE_NAME, environment: settings.environment },
  };

  const transport = buildTransport(settings);
  if (transport) {
    options.transport = transport;
  }

  // pino refuses level formatters next to multi-target transports
  if (!transport || !('targets' in transport)) {
    options.formatters = {
      level: label => ({ level: label }),
    };
  }

  return options;
}

/**
 * Level of the access log line for a finished request. Redirects are
 * not logged.
 */
export function requestLogLevel(
  statusCode: number,
  error?: Error,
): pino.LevelWithSilent {
  if (statusCode >= 500 || error) {
    return 'error';
  }
  if (statusCode >= 400) {
    return 'warn';
  }
  if (statusCode >= 300) {
    return 'silent';
  }
  return 'info';
}

export function createPinoConfig(
  settings: LoggerSettings = resolveLoggerSettings(),
): Params {
  return {
    pinoHttp: {
      ...createLoggerOptions(settings),
      customLogLevel: (_req, res, err) => requestLogLevel(res.statusCode, err),
      customSuccessMessage: req => `${req.method} ${req.url} completed`,
      customErrorMessage: (req, _res, err) =>
        `${req.method} ${req.url} failed - ${err.message}`,
      customAttributeKeys: {
        req: 'request',
        res: 'response',
        err: 'error',
        responseTime: 'duration',
      },
      serializers: {
        req: (req: SerializedRequest) => ({
          method: req.method,
          url: req.url,
          userAgent: req.headers['user-agent'],
          ip: req.remoteAddress,
          correlationId:
            firstHeaderValue(req.headers[CORRELATION_ID_HEADER]) ?? req.id,
        }),
        res: (res: SerializedResponse) => ({
          statusCode: res.statusCode,
        }),
        err: pino.stdSerializers.err,
      },
      genReqId: (req: IncomingMessage) =>
        firstHeaderValue(req.headers[CORRELATION_ID_HEADER]) ?? uuidv4(),
    },
    exclude: ['/health'],
  };
}
