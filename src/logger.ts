import { config } from './config';

// ANSI colors for console output
const colors = {
  reset: '\x1b[0m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

/**
 * Console logger for the shortener and its HTTP requests
 */
export class Logger {
  constructor(
    private readonly scope: string,
    private enabled: boolean = true
  ) {}

  private timestamp(): string {
    return new Date().toISOString().split('T')[1].slice(0, 12);
  }

  private prefix(color: string): string {
    return `${colors.gray}[${this.timestamp()}]${colors.reset} ${color}${this.scope}${colors.reset}`;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  info(msg: string): void {
    if (!this.enabled) return;
    console.log(`${this.prefix(colors.cyan)} ${msg}`);
  }

  warn(msg: string): void {
    if (!this.enabled) return;
    console.warn(`${this.prefix(colors.yellow)} ${msg}`);
  }

  error(msg: string, error?: unknown): void {
    if (!this.enabled) return;
    if (error === undefined) {
      console.error(`${this.prefix(colors.red)} ${msg}`);
    } else {
      console.error(`${this.prefix(colors.red)} ${msg}`, error);
    }
  }

  request(method: string, path: string, status: number, durationMs: number): void {
    if (!this.enabled) return;
    const color = status >= 500 ? colors.red : status >= 400 ? colors.yellow : colors.green;
    console.log(
      `${this.prefix(colors.cyan)} ${method} ${path} ${color}${status}${colors.reset} ${colors.gray}(${durationMs.toFixed(2)}ms)${colors.reset}`
    );
  }
}

export const logger = new Logger('SHORTENER', config.logging);
