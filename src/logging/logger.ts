import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { MiddlewareHandler } from 'hono';

/**
 * Paths redacted from every log line
 */
export const DEFAULT_REDACT_PATHS = [
  'password',
  'secret',
  'token',
  'accessToken',
  'refreshToken',
  'access_token',
  'refresh_token',
  'credentialDigest',
  'providerTokens',
  '*.password',
  '*.secret',
  '*.token',
  '*.accessToken',
  '*.refreshToken',
  '*.access_token',
  '*.refresh_token',
  'req.headers.authorization',
  'req.headers.cookie',
  "res.headers['set-cookie']",
] as const;

export interface CreateRootLoggerOptions {
  level?: string;
  environment?: string;
  pretty?: boolean;
  destination?: DestinationStream;
}

/**
 * Create the process root logger
 *
 * JSON with ISO timestamps; pretty-printed when `pretty` is set
 * (development default).
 */
export function createRootLogger(options: CreateRootLoggerOptions = {}): Logger {
  const {
    level = process.env['LOG_LEVEL'] ?? 'info',
    environment = process.env['NODE_ENV'] ?? 'development',
    pretty = environment === 'development',
    destination,
  } = options;

  const pinoOptions: LoggerOptions = {
    level,
    base: { service: 'auth-core', env: environment },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: [...DEFAULT_REDACT_PATHS], censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (destination) {
    return pino(pinoOptions, destination);
  }

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions);
}

let rootLogger: Logger | null = null;

/**
 * Get the shared root logger (created on first use)
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    // Quiet by default under the test runner
    rootLogger = process.env['VITEST']
      ? createRootLogger({ level: 'silent', pretty: false })
      : createRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the shared root logger (entry point and tests)
 */
export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Child logger tagged with a component name
 */
export function createLogger(component: string, parent: Logger = getLogger()): Logger {
  return parent.child({ component });
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger = createLogger('http')): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log query strings: OAuth callbacks carry codes and state
    logger.info(
      {
        method,
        path,
        status: c.res.status,
        duration: Date.now() - start,
      },
      'request completed'
    );
  };
}

export type { Logger };
