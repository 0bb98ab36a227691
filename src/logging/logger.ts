import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

export interface LoggerOptions {
  level?: string;
  /** Append log lines to this file as well as the console. */
  file?: string;
  /** Disable ANSI colors on the console transport. */
  plain?: boolean;
  /** Suppress the console transport (file only, or silent). */
  quiet?: boolean;
}

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
  const moduleTag = typeof mod === 'string' ? ` [${mod}]` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level}${moduleTag} ${String(message)}${metaStr}`;
});

/** Create the run logger: console plus an optional file transport. */
export function createRunLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [];

  if (!options.quiet) {
    transports.push(
      new winston.transports.Console({
        stderrLevels: ['error', 'warn'],
        format: options.plain
          ? combine(timestamp({ format: 'HH:mm:ss.SSS' }), logFormat)
          : combine(colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), logFormat)
      })
    );
  }

  if (options.file) {
    transports.push(
      new winston.transports.File({
        filename: options.file,
        format: combine(timestamp(), logFormat)
      })
    );
  }

  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    silent: transports.length === 0,
    transports
  });
}

/** Logger that discards everything; the default when callers pass none. */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({ silent: true });
}

/** Child logger tagged with a pipeline module name. */
export function createModuleLogger(parent: winston.Logger, moduleName: string): winston.Logger {
  return parent.child({ module: moduleName });
}
