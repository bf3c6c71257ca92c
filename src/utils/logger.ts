import fs from 'fs';
import path from 'path';

// Define log levels
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  stackTrace?: string;
}

// Interface for RPC request failure logs
interface ApiLogEntry {
  timestamp: string;
  level: LogLevel;
  method: string;
  params?: unknown;
  errorMessage?: string;
  errorCode?: string | number;
  stackTrace?: string;
  responseTime?: number;
}

export interface LoggerOptions {
  level?: LogLevel;
  // Directory for log files, null disables file output
  logDir?: string | null;
  consoleOutput?: boolean;
}

interface CallStats {
  count: number;
  lastTime: number;
}

export interface FailureStats {
  overallRate: number;
  methodStats: {
    [method: string]: {
      success: number;
      failure: number;
      rate: number;
    };
  };
}

export class Logger {
  private level: LogLevel;
  private logFile: string | null = null;
  private apiLogFile: string | null = null;
  private consoleOutput: boolean;
  private failureCounter: Map<string, CallStats> = new Map();
  private successCounter: Map<string, CallStats> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.consoleOutput = options.consoleOutput ?? true;

    const logDir = options.logDir === undefined ? path.join(process.cwd(), 'logs') : options.logDir;
    if (logDir !== null) {
      // Create log directory if it doesn't exist
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.logFile = path.join(logDir, 'relayer.log');
      this.apiLogFile = path.join(logDir, 'rpc-failures.log');
    }
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  public error(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.write('error', message, context, error);
  }

  public critical(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.write('critical', message, context, error);
  }

  public isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message
    };
    if (context) {
      entry.context = context;
    }
    if (error instanceof Error && error.stack) {
      entry.stackTrace = error.stack;
    }

    if (this.logFile) {
      fs.appendFileSync(this.logFile, JSON.stringify(entry, jsonReplacer) + '\n');
    }

    if (this.consoleOutput) {
      const line = `${entry.timestamp} - ${level.toUpperCase()} - ${message}`;
      const extra = context ? [JSON.stringify(context, jsonReplacer)] : [];
      if (level === 'error' || level === 'critical') {
        console.error(line, ...extra, ...(entry.stackTrace ? [entry.stackTrace] : []));
      } else if (level === 'warn') {
        console.warn(line, ...extra);
      } else if (level === 'debug') {
        console.debug(line, ...extra);
      } else {
        console.log(line, ...extra);
      }
    }
  }

  public logApiFailure(method: string, params?: unknown, error?: unknown, responseTime?: number): void {
    const now = new Date();

    // Increment failure counter for this method
    this.bump(this.failureCounter, method, now.getTime());

    const logEntry: ApiLogEntry = {
      timestamp: now.toISOString(),
      level: 'error',
      method,
      params,
      responseTime,
      errorMessage: error instanceof Error ? error.message : 'Unknown error',
      errorCode: errorCodeOf(error)
    };

    if (error instanceof Error && error.stack) {
      logEntry.stackTrace = error.stack;
    }

    if (this.apiLogFile) {
      fs.appendFileSync(this.apiLogFile, JSON.stringify(logEntry, jsonReplacer) + '\n');
    }

    if (this.consoleOutput && this.isEnabled('warn')) {
      console.error(`RPC FAILURE [${method}]: ${logEntry.errorMessage} (${logEntry.errorCode})`);
    }
  }

  public logApiSuccess(method: string, _params?: unknown, _responseTime?: number): void {
    this.bump(this.successCounter, method, Date.now());
  }

  private bump(counter: Map<string, CallStats>, method: string, time: number): void {
    const current = counter.get(method) || { count: 0, lastTime: 0 };
    counter.set(method, { count: current.count + 1, lastTime: time });
  }

  public getFailureRate(method?: string): { total: number; success: number; failure: number; rate: number } {
    let totalSuccess = 0;
    let totalFailure = 0;

    for (const [key, stats] of this.successCounter.entries()) {
      if (!method || key === method) totalSuccess += stats.count;
    }
    for (const [key, stats] of this.failureCounter.entries()) {
      if (!method || key === method) totalFailure += stats.count;
    }

    const total = totalSuccess + totalFailure;
    const rate = total > 0 ? (totalFailure / total) * 100 : 0;

    return {
      total,
      success: totalSuccess,
      failure: totalFailure,
      rate
    };
  }

  public getFailureStats(): FailureStats {
    const methodStats: FailureStats['methodStats'] = {};
    const allMethods = new Set<string>([...this.successCounter.keys(), ...this.failureCounter.keys()]);

    for (const method of allMethods) {
      const stats = this.getFailureRate(method);
      methodStats[method] = {
        success: stats.success,
        failure: stats.failure,
        rate: stats.rate
      };
    }

    return {
      overallRate: this.getFailureRate().rate,
      methodStats
    };
  }
}

// bigint values (decoded event args) are not JSON serializable by default
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function errorCodeOf(error: unknown): string | number {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') {
      return code;
    }
  }
  return 'UNKNOWN_ERROR';
}
