import winston from 'winston';
import { GatewayConfig } from '@/types/config';

const LOG_FILE_MAX_BYTES = 10 * 1024 * 1024;
const LOG_FILE_COUNT = 5;

/** `HH:mm:ss level message {meta}`: one line per entry, upstream method and timings in the meta. */
export const consoleLine = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level} ${message}${details}`;
  })
);

/**
 * Process-wide winston logger for the gateway. Silent while tests run.
 */
export class Logger {
  private static instance: Logger | undefined;
  private logger: winston.Logger;

  private constructor(config: GatewayConfig) {
    this.logger = this.createLogger(config);
  }

  static getInstance(config?: GatewayConfig): Logger {
    if (!Logger.instance) {
      if (!config) {
        throw new Error('Logger has not been initialised with a configuration');
      }
      Logger.instance = new Logger(config);
    }
    return Logger.instance;
  }

  private createLogger(config: GatewayConfig): winston.Logger {
    const transports: winston.transport[] = [];

    if (config.server.environment === 'production') {
      const rotation = { maxsize: LOG_FILE_MAX_BYTES, maxFiles: LOG_FILE_COUNT };
      transports.push(
        new winston.transports.File({ filename: 'logs/error.log', level: 'error', ...rotation }),
        new winston.transports.File({ filename: 'logs/gateway.log', ...rotation })
      );
    }

    if (config.logging.enableConsole) {
      transports.push(new winston.transports.Console({ format: consoleLine }));
    }

    return winston.createLogger({
      level: config.logging.level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      silent: config.server.environment === 'test',
      exitOnError: false,
    });
  }

  info(message: string, meta?: object): void {
    this.logger.info(message, meta);
  }

  error(message: string, error?: Error | object): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        error: error.message,
        stack: error.stack,
        name: error.name,
      });
    } else {
      this.logger.error(message, error);
    }
  }

  warn(message: string, meta?: object): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: object): void {
    this.logger.debug(message, meta);
  }

  http(message: string, meta?: object): void {
    this.logger.http(message, meta);
  }
}
