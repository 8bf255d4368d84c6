import { RunContext } from '../../types/CommonTypes';

export interface LogMeta {
  [key: string]: unknown;
  runId?: string;
  database?: string;
}

export class Logger {
  private serviceName: string;
  private readonly defaultContext?: RunContext;

  constructor(serviceName: string, context?: RunContext) {
    this.serviceName = serviceName;
    this.defaultContext = context;
  }

  private formatMessage(
    level: string,
    message: string,
    meta?: LogMeta
  ): string {
    const timestamp = new Date().toISOString();
    const enrichedMeta = {
      ...this.defaultContext,
      ...meta,
    };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta, replaceErrors)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;
  }

  info(message: string, meta?: LogMeta): void {
    console.log(this.formatMessage('info', message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.formatMessage('error', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    console.warn(this.formatMessage('warn', message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    const logLevel = process.env.LOG_LEVEL || 'info';
    if (logLevel === 'debug') {
      console.log(this.formatMessage('debug', message, meta));
    }
  }

  /**
   * Same service name, bound to a run
   */
  child(context: RunContext): Logger {
    return new Logger(this.serviceName, { ...this.defaultContext, ...context });
  }
}

// Error instances serialize to {} otherwise
function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
