export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export class ParseError extends Error {
  constructor(message: string, public readonly details?: string[]) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly variable: string, message: string) {
    super(`[config] ${variable} ${message}`);
    this.name = 'ConfigError';
  }
}

export class SinkError extends Error {
  constructor(public readonly sink: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
