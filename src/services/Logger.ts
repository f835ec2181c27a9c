import { LogLevel } from '../types';

export interface LoggerOptions {
  level: LogLevel;
  enableColors?: boolean;
}

type MessageLevel = Exclude<LogLevel, 'disabled'>;

const LEVEL_ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'disabled'];

const COLORED_PREFIXES: Record<MessageLevel, string> = {
  debug: '\x1b[36m[DEBUG]\x1b[0m',  // Cyan
  info: '\x1b[32m[INFO]\x1b[0m',    // Green
  warn: '\x1b[33m[WARN]\x1b[0m',    // Yellow
  error: '\x1b[31m[ERROR]\x1b[0m'   // Red
};

/**
 * Process-scoped logger. One instance is built from the loaded configuration
 * at startup and handed to every service; its level never changes afterwards.
 */
export class Logger {
  readonly level: LogLevel;
  private readonly enableColors: boolean;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.enableColors = options.enableColors ?? Boolean(process.stdout.isTTY);
  }

  static silent(): Logger {
    return new Logger({ level: 'disabled', enableColors: false });
  }

  /** Level name understood by the HTTP framework's request logger. */
  get frameworkLevel(): string {
    return this.level === 'disabled' ? 'silent' : this.level;
  }

  isEnabled(level: MessageLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private formatMessage(level: MessageLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const prefix = this.enableColors ? COLORED_PREFIXES[level] : `[${level.toUpperCase()}]`;
    return `${timestamp} ${prefix} ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled('debug')) {
      console.log(this.formatMessage('debug', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled('info')) {
      console.log(this.formatMessage('info', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled('warn')) {
      console.warn(this.formatMessage('warn', message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled('error')) {
      console.error(this.formatMessage('error', message), ...args);
    }
  }

  logBootstrapStart(projectCount: number, upstreamCount: number): void {
    this.info(`🔧 Bootstrapping ${upstreamCount} upstreams across ${projectCount} projects...`);
  }

  logChainResolved(projectId: string, upstreamId: string, chainId: number, probed: boolean): void {
    this.debug(`🔗 ${projectId}/${upstreamId}: chain ${chainId} (${probed ? 'probed' : 'declared'})`);
  }

  logChainResolutionFailure(projectId: string, upstreamId: string, error: Error): void {
    this.error(`❌ ${projectId}/${upstreamId}: chain id resolution failed - ${error.message}`);
  }

  logRoutingDecision(operationName: string, reason: string): void {
    this.debug(`🔄 ${operationName}: ${reason}`);
  }

  logRoutingStop(operationName: string, reason: string): void {
    this.debug(`🔴 ${operationName}: ${reason} - stopping pipeline`);
  }

  logRequestFailure(upstreamId: string, error: string): void {
    this.warn(`❌ Request to ${upstreamId} failed - ${error}`);
  }
}
