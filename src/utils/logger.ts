import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

/**
 * Logging surface shared by the file logger and the disabled logger
 */
export interface RcaLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  setLevel(level: LogLevel): void;
  enableConsoleOutput(enable: boolean): void;
  close(): void;
}

export class Logger implements RcaLogger {
  private logStream: fs.WriteStream;
  private debugLogStream: fs.WriteStream;
  private level: LogLevel;
  private enableConsole: boolean;

  constructor(logFile: string, level: LogLevel = LogLevel.INFO, enableConsole: boolean = false) {
    this.level = level;
    this.enableConsole = enableConsole;

    const logDir = path.dirname(logFile);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    this.logStream = fs.createWriteStream(logFile, { flags: 'a' });

    // Debug entries go to a companion file next to the main log
    const debugLogFile = logFile.replace(/\.log$/, '-debug.log');
    this.debugLogStream = fs.createWriteStream(debugLogFile, { flags: 'a' });
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public enableConsoleOutput(enable: boolean): void {
    this.enableConsole = enable;
  }

  public debug(message: string, data?: unknown): void {
    if (this.level <= LogLevel.DEBUG) {
      this.writeLog('DEBUG', message, data, this.debugLogStream);
    }
  }

  public info(message: string, data?: unknown): void {
    if (this.level <= LogLevel.INFO) {
      this.writeLog('INFO', message, data);
    }
  }

  public warn(message: string, data?: unknown): void {
    if (this.level <= LogLevel.WARN) {
      this.writeLog('WARN', message, data);
    }
  }

  public error(message: string, data?: unknown): void {
    if (this.level <= LogLevel.ERROR) {
      this.writeLog('ERROR', message, data);
    }
  }

  private writeLog(level: string, message: string, data?: unknown, stream?: fs.WriteStream): void {
    const timestamp = new Date().toISOString();
    const logString = JSON.stringify({ timestamp, level, message, data }) + '\n';

    (stream || this.logStream).write(logString);

    if (!stream) {
      this.debugLogStream.write(logString);
    }

    if (this.enableConsole) {
      const consoleData = data ? ` ${JSON.stringify(data)}` : '';
      // stderr keeps stdout free for callers that print the run result
      console.error(`[${timestamp}] [${level}] ${message}${consoleData}`);
    }
  }

  public close(): void {
    this.logStream.end();
    this.debugLogStream.end();
  }
}

/**
 * Logger installed when RCA_LOGLEVEL is OFF or unset
 */
export class DisabledLogger implements RcaLogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  setLevel(): void {}
  enableConsoleOutput(): void {}
  close(): void {}
}

// Logging configuration via environment variables
// RCA_LOGLEVEL: OFF | ERROR | WARN | INFO | DEBUG (default: OFF)
// RCA_LOGFILE: path to log file (default: logs/rca-engine.log)

export function logLevelFromString(level: string): LogLevel | null {
  switch (level.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'OFF': default: return null;
  }
}

const LOGLEVEL = process.env.RCA_LOGLEVEL || 'OFF';
const LOGFILE = process.env.RCA_LOGFILE || path.resolve(process.cwd(), 'logs', 'rca-engine.log');

const level = logLevelFromString(LOGLEVEL);
const logger: RcaLogger = level === null
  ? new DisabledLogger()
  : new Logger(LOGFILE, level, process.env.RCA_LOG_CONSOLE === 'true');

export { logger };

// Handle process exit to ensure logs are flushed
process.on('exit', () => {
  logger.close();
});
