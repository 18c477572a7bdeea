export class FindrError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FindrError';
  }
}

export class ConfigurationError extends FindrError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SchemaValidationError extends FindrError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class UpstreamHttpError extends FindrError {
  constructor(
    message: string,
    public readonly status: number | undefined,
    cause?: Error,
  ) {
    super(message, 'UPSTREAM_HTTP_ERROR', cause);
    this.name = 'UpstreamHttpError';
  }
}

export class RateLimitExhaustedError extends FindrError {
  constructor(
    message: string,
    public readonly retries: number,
  ) {
    super(message, 'RATE_LIMIT_EXHAUSTED');
    this.name = 'RateLimitExhaustedError';
  }
}

export class ToolNotFoundError extends FindrError {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`, 'TOOL_NOT_FOUND');
    this.name = 'ToolNotFoundError';
  }
}
