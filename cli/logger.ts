import chalk from 'chalk';
import type { LogLevel, ReportFormat } from '../lib/config';
import { type Diagnostic, formatDiagnostic } from '../lib/validation/diagnostics';

export interface CLILoggerOptions {
  level: LogLevel;
  format: ReportFormat;
  // Defaults to stderr so the report on stdout stays clean
  write?: (line: string) => void;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class CLILogger {
  private level: LogLevel;
  private format: ReportFormat;
  private write: (line: string) => void;

  constructor(options: CLILoggerOptions) {
    this.level = options.level;
    this.format = options.format;
    this.write = options.write ?? (line => console.error(line));
  }

  onLog(level: LogLevel, content: string): void {
    if (!this.shouldLog(level)) return;

    if (this.format === 'json') {
      this.write(JSON.stringify({ level, source: 'omplift', content }));
    } else if (this.format === 'plain') {
      this.write(`[${level}] ${content}`);
    } else {
      this.write(this.colorize(level, content));
    }
  }

  onPhase(phase: string): void {
    this.onLog('debug', `phase ${phase}`);
  }

  onDiagnostic(diagnostic: Diagnostic): void {
    this.onLog(diagnostic.severity === 'warning' ? 'warn' : 'debug', formatDiagnostic(diagnostic));
  }

  debug(msg: string): void {
    this.onLog('debug', msg);
  }

  info(msg: string): void {
    this.onLog('info', msg);
  }

  warn(msg: string): void {
    this.onLog('warn', msg);
  }

  error(msg: string): void {
    this.onLog('error', msg);
  }

  private colorize(level: LogLevel, text: string): string {
    switch (level) {
      case 'error':
        return chalk.red(text);
      case 'warn':
        return chalk.yellow(text);
      case 'debug':
        return chalk.gray(text);
      case 'info':
      default:
        return text;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }
}

export function createCLILogger(options: CLILoggerOptions): CLILogger {
  return new CLILogger(options);
}
