export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const PREFIX = "[wirecall]";

export class ConsoleLogger implements Logger {
  constructor(private readonly prefix = PREFIX) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.write(console.debug, `${this.prefix} [DEBUG] ${message}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write(console.info, `${this.prefix} ${message}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write(console.warn, `${this.prefix} ${message}`, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write(console.error, `${this.prefix} ${message}`, data);
  }

  private write(
    sink: (...args: unknown[]) => void,
    line: string,
    data: Record<string, unknown> | undefined,
  ): void {
    if (data) {
      sink(line, data);
    } else {
      sink(line);
    }
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
