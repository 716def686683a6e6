import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return LEVELS.find(l => l === level) ?? 'warn';
}

// Everything goes to stderr so stdout carries only progress and the report.
const root = winston.createLogger({
  level: levelFromEnv(),
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: [...LEVELS],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, context, ...meta }) => {
          const prefix = context ? `${level} [${String(context)}]` : level;
          const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${prefix} ${String(message)}${extra}`;
        }),
      ),
    }),
  ],
});

export class Logger {
  private logger: winston.Logger;

  constructor(context: string) {
    this.logger = root.child({ context });
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.write('info', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.write('warn', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.write('debug', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (meta) {
      this.logger.log(level, message, meta);
    } else {
      this.logger.log(level, message);
    }
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
}
