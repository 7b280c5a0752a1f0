import pino from 'pino';

export interface LoggerConfig {
  serviceName: string;
  level?: string;
  prettyPrint?: boolean;
  destination?: pino.DestinationStream;
}

type Context = Record<string, unknown>;

// Credentials that travel through provider clients; never written out.
const REDACT_PATHS = ['authorization', 'token', 'privateKey', 'assertion', '*.authorization', '*.privateKey'];

interface SerializedError {
  name: string;
  message: string;
  code?: string;
  document?: unknown;
  cause?: SerializedError;
  stack?: string;
}

const serializeError = (error: Error, depth = 0): SerializedError => {
  const serialized: SerializedError = { name: error.name, message: error.message, stack: error.stack };
  if ('code' in error && typeof error.code === 'string') serialized.code = error.code;
  if ('document' in error && error.document) serialized.document = error.document;
  if ('cause' in error && error.cause instanceof Error && depth < 3) {
    serialized.cause = serializeError(error.cause, depth + 1);
  }
  return serialized;
};

export class Logger {
  private readonly logger: pino.Logger;

  constructor(config: LoggerConfig, instance?: pino.Logger) {
    this.logger =
      instance ||
      pino({
        level: config.level || 'info',
        transport: config.prettyPrint
          ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
          : undefined,
        base: { service: config.serviceName },
        timestamp: pino.stdTimeFunctions.isoTime,
        redact: { paths: REDACT_PATHS, censor: '[redacted]' },
      }, config.destination);
  }

  info(msg: string, context?: Context): void {
    this.logger.info(context || {}, msg);
  }

  /** Error codes, document context and the cause chain are logged with the error. */
  error(msg: string, error?: Error, context?: Context): void {
    this.logger.error({ ...(context || {}), error: error ? serializeError(error) : undefined }, msg);
  }

  warn(msg: string, context?: Context): void {
    this.logger.warn(context || {}, msg);
  }

  debug(msg: string, context?: Context): void {
    this.logger.debug(context || {}, msg);
  }

  child(bindings: Context): Logger {
    const service = this.logger.bindings().service;
    return new Logger(
      { serviceName: typeof service === 'string' ? service : 'unknown', level: this.logger.level },
      this.logger.child(bindings)
    );
  }
}

export const createLogger = (config: LoggerConfig): Logger => new Logger(config);
