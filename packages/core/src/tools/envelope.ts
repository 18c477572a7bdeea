import type pino from 'pino';
import {
  ConfigurationError,
  RateLimitExhaustedError,
  SchemaValidationError,
  UpstreamHttpError,
} from '@findr/shared/src/utils/errors.js';
import type { ToolErrorKind, ToolFailure } from '@findr/shared/src/types/tool.types.js';

export function classifyError(error: unknown): ToolErrorKind {
  if (error instanceof ConfigurationError) {
    return 'configuration';
  }
  if (error instanceof SchemaValidationError) {
    return 'invalid_input';
  }
  if (error instanceof RateLimitExhaustedError) {
    return 'rate_limit_exhausted';
  }
  if (error instanceof UpstreamHttpError) {
    return 'upstream_http';
  }
  return 'unexpected';
}

function describeError(kind: ToolErrorKind, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);

  switch (kind) {
    case 'configuration':
      return `Configuration error: ${message}`;
    case 'invalid_input': {
      const details =
        error instanceof SchemaValidationError ? ` (${error.validationErrors.join('; ')})` : '';
      return `Invalid input: ${message}${details}`;
    }
    case 'rate_limit_exhausted':
    case 'upstream_http':
      return `HTTP error occurred: ${message}`;
    case 'unexpected':
      return `An error occurred: ${message}`;
  }
}

export function toFailureEnvelope(error: unknown, log: pino.Logger): ToolFailure {
  const errorKind = classifyError(error);
  const message = describeError(errorKind, error);

  if (errorKind === 'unexpected') {
    log.error(
      { error: error instanceof Error ? error.message : String(error), stack: error instanceof Error ? error.stack : undefined },
      'Tool invocation failed unexpectedly',
    );
  } else {
    log.warn({ errorKind, error: message }, 'Tool invocation failed');
  }

  return { output: [], error: message, errorKind };
}
