export interface Logger {
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

/**
 * Writes `[tag] message` lines with the metadata record appended, the same
 * shape every entry point uses for its own console output.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly tag = "engine") {}

  info(message: string, metadata?: Record<string, unknown>): void {
    console.info(`[${this.tag}] ${message}`, metadata ?? {});
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    console.warn(`[${this.tag}] ${message}`, metadata ?? {});
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    console.error(`[${this.tag}] ${message}`, metadata ?? {});
  }
}

export class NoopLogger implements Logger {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  info(_message: string, _metadata?: Record<string, unknown>): void {}
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  warn(_message: string, _metadata?: Record<string, unknown>): void {}
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  error(_message: string, _metadata?: Record<string, unknown>): void {}
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
