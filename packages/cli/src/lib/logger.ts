/**
 * Structured Logger for the minorbuild CLI
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Verbose mode support
 * - Silent mode and JSON lines output
 * - Automatic redaction of sensitive data
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  json?: boolean;
}

/**
 * Patterns that indicate sensitive data to redact
 */
const SENSITIVE_PATTERNS = [/password/i, /secret/i, /token/i, /credential/i];

class Logger {
  private verbose = false;
  private silent = false;
  private json = false;

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.json = options.json ?? false;
  }

  get isVerbose(): boolean {
    return this.verbose;
  }

  get isJson(): boolean {
    return this.json;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose || this.silent) return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /**
   * Announce a stage of the run
   */
  stage(message: string): void {
    if (this.silent) return;
    if (this.json) {
      this.log('info', message);
      return;
    }
    console.log(pc.cyan('>>>'), message);
  }

  /**
   * Log a step in a process (for progress indication)
   */
  step(step: number, total: number, message: string): void {
    if (this.silent) return;
    if (this.json) {
      this.log('info', message, { step, total });
      return;
    }
    console.log(pc.dim(`[${step}/${total}]`), message);
  }

  success(message: string): void {
    if (this.silent) return;
    if (this.json) {
      this.log('info', message);
      return;
    }
    console.log(pc.green('✓'), message);
  }

  fail(message: string): void {
    if (this.json) {
      this.log('error', message);
      return;
    }
    console.log(pc.red('✗'), message);
  }

  /**
   * Print captured output of an external command, indented under its label.
   * Written even in silent mode: it only appears when something failed.
   */
  output(label: string, text: string): void {
    if (!text) return;
    if (this.json) {
      this.log('error', label, { output: text });
      return;
    }
    console.error(pc.dim(`  ${label}:`));
    for (const line of text.split('\n')) {
      console.error(pc.dim(`    ${line}`));
    }
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const redactedData = data ? this.redact(data) : undefined;

    if (this.json) {
      console.log(
        JSON.stringify({
          timestamp,
          level,
          message,
          ...(redactedData && { data: redactedData }),
        })
      );
      return;
    }

    const formattedMessage = `${this.getPrefix(level)} ${message}`;

    if (level === 'error') {
      console.error(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.verbose && redactedData) {
      console.log(pc.dim(JSON.stringify(redactedData, null, 2)));
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return pc.dim('[DEBUG]');
      case 'info':
        return pc.blue('[INFO]');
      case 'warn':
        return pc.yellow('[WARN]');
      case 'error':
        return pc.red('[ERROR]');
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
        redacted[key] = '[REDACTED]';
      } else if (isRecord(value)) {
        redacted[key] = this.redact(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Singleton logger instance
export const logger = new Logger();
