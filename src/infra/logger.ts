import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level: string;
  service: string;
  env: string;
  silent?: boolean;
}

/**
 * Structured JSON in production, colorized single lines elsewhere.
 * Built once at startup and handed to whatever needs it.
 */
export function createLogger(options: LoggerOptions): Logger {
  const format =
    options.env === 'production'
      ? winston.format.json()
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.printf((info: winston.Logform.TransformableInfo) => {
            const { timestamp, level, message, stack, service: _service, env: _env, ...meta } = info;
            const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            const trace = typeof stack === 'string' ? `\n${stack}` : '';
            return `${String(timestamp)} ${level}: ${String(message)}${extra}${trace}`;
          })
        );

  return winston.createLogger({
    level: options.level,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      format
    ),
    defaultMeta: {
      service: options.service,
      env: options.env,
    },
    transports: [new winston.transports.Console()],
  });
}

/**
 * Log metadata for a caught value. Error instances serialize to `{}` under
 * the JSON format, so their fields are copied out.
 */
export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: { name: error.name, message: error.message, stack: error.stack } };
  }
  return { error: String(error) };
}
