/**
 * ConsoleLogger: default log sink for validation runs.
 *
 * Writes prefixed lines through the console so warnings and violations
 * stay visible in CI logs. Tests pass their own `Logger` to capture
 * output instead.
 */

export interface Logger {
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;

  constructor(opts?: { prefix?: string }) {
    this.prefix = opts?.prefix ?? "[roster]";
  }

  warn(message: string): void {
    console.warn(`${this.prefix} ${message}`);
  }

  error(message: string): void {
    console.error(`${this.prefix} ${message}`);
  }
}
