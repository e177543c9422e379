/**
 * Console logger with a scope tag, e.g. `[posts] wrote_total=50`.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
}

class ConsoleLogger implements Logger {
  constructor(private readonly scope: string) {}

  info(message: string): void {
    console.log(`[${this.scope}] ${message}`);
  }

  warn(message: string, error?: unknown): void {
    if (error === undefined) {
      console.warn(`[${this.scope}] ${message}`);
    } else {
      console.warn(`[${this.scope}] ${message}:`, error instanceof Error ? error.message : error);
    }
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      console.error(`[${this.scope}] ${message}`);
    } else {
      console.error(`[${this.scope}] ${message}:`, error);
    }
  }

  child(scope: string): Logger {
    return new ConsoleLogger(scope);
  }
}

const noop = (): void => {};

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};

export function createLogger(scope = 'crawl'): Logger {
  return new ConsoleLogger(scope);
}
