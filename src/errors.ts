export class HarnessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * No well-formed response was received: connection refused, timeout, or a
 * body that could not be decoded.
 */
export class TransportError extends HarnessError {
  constructor(
    readonly reason: string,
    readonly method: string,
    readonly path: string,
  ) {
    super(`${method} ${path}: ${reason}`);
  }
}

export class EnvironmentError extends HarnessError {
  constructor(
    readonly baseUrl: string,
    readonly reason: string,
  ) {
    super(`Cannot connect to API server at ${baseUrl}: ${reason}`);
  }
}

export class EmptyResultLogError extends HarnessError {
  constructor() {
    super('Cannot compute statistics for an empty result log');
  }
}

export class InvalidTestCaseError extends HarnessError {}

export class ConfigError extends HarnessError {
  constructor(readonly issues: { path: string; message: string }[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ')}`,
    );
  }
}
