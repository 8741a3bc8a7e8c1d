// Setup errors are thrown to the embedding program; per-request errors are
// caught by the dispatcher and mapped to a bare status code.

export class AlreadyInitializedError extends Error {
  constructor(readonly slot: string) {
    super(`${slot} is already initialized`);
    this.name = 'AlreadyInitializedError';
  }
}

export class NoResourceError extends Error {
  constructor() {
    super('At least one resource must be registered before starting the API');
    this.name = 'NoResourceError';
  }
}

export class FormParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FormParseError';
  }
}

export class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export class EncodeError extends Error {
  constructor(readonly codec: string, options?: { cause?: unknown }) {
    super(`Failed to encode payload as ${codec}: ${describeError(options?.cause)}`, options);
    this.name = 'EncodeError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
