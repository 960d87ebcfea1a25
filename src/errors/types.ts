/**
 * Error type definitions for docfuse
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 *
 * Two families live here: the CLI-facing errors (config, files, API keys)
 * and the embedding/pipeline errors raised while fusing nodes.
 */

/**
 * Base class for all docfuse errors.
 *
 * - hint: Tells the user HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Out-of-range merge settings
 * - Unknown config keys
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: docfuse config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a cloud provider's credentials are missing.
 *
 * The hint names the exact env var to set.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} credentials not configured`,
      `Set the ${envVarName} environment variable`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// EMBEDDING & PIPELINE ERRORS
// ============================================================================

/**
 * Base class for failures raised while embedding or fusing nodes.
 *
 * `retryable` tells the retry policy whether another attempt may succeed.
 * `nodeIndex` is filled in by the pipeline once it knows which node
 * triggered the failure, so the single reported error points at the input.
 *
 * Exit code 6: Ingestion failure
 */
export class EmbeddingError extends CLIError {
  /** Whether the caller may retry the same request */
  public readonly retryable: boolean;

  /** Provider that raised the error, when known */
  public readonly provider?: string;

  /** Index of the node being processed when the error surfaced */
  public nodeIndex?: number;

  constructor(
    message: string,
    options: { retryable?: boolean; provider?: string; hint?: string } = {}
  ) {
    super(message, options.hint ?? 'Run with --verbose for more details', 6);
    this.name = 'EmbeddingError';
    this.retryable = options.retryable ?? false;
    this.provider = options.provider;
  }
}

/**
 * Thrown when a provider is asked to embed empty or whitespace-only text.
 * Providers never return zero vectors for such input.
 */
export class EmptyInputError extends EmbeddingError {
  constructor(provider?: string) {
    super('Cannot embed empty text', {
      provider,
      hint: 'Remove blank fragments before ingestion',
    });
    this.name = 'EmptyInputError';
  }
}

/**
 * Network, authentication or server-side failure. Retryable.
 */
export class ProviderUnavailableError extends EmbeddingError {
  /** HTTP status, when the failure came from a response */
  public readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(`${provider} embedding provider unavailable: ${message}`, {
      retryable: true,
      provider,
      hint: 'Check that the provider is reachable and its credentials are valid',
    });
    this.name = 'ProviderUnavailableError';
    this.status = status;
  }
}

/**
 * The provider throttled the request (HTTP 429). Retryable.
 */
export class RateLimitError extends EmbeddingError {
  constructor(provider: string, message: string = 'rate limit exceeded') {
    super(`${provider} embedding provider: ${message}`, {
      retryable: true,
      provider,
      hint: 'Lower embedding.max_concurrent or raise embedding.retry_backoff_ms',
    });
    this.name = 'RateLimitError';
  }
}

/**
 * The provider answered, but not with a usable embedding.
 */
export class InvalidResponseError extends EmbeddingError {
  constructor(provider: string, message: string) {
    super(`${provider} returned an invalid embedding response: ${message}`, {
      provider,
    });
    this.name = 'InvalidResponseError';
  }
}

/**
 * Two vectors cannot be compared: lengths differ or one has zero norm.
 * Indicates vectors from different providers or models in the same run.
 */
export class DimensionMismatchError extends EmbeddingError {
  constructor(message: string) {
    super(message, {
      hint: 'Do not mix embedding providers or models within one run',
    });
    this.name = 'DimensionMismatchError';
  }
}

/**
 * A retryable failure kept failing until the retry budget ran out.
 * Aborts the whole ingestion run.
 */
export class RetryExhaustedError extends EmbeddingError {
  /** Number of calls made, including the first one */
  public readonly attempts: number;

  /** The last failure seen */
  public readonly lastError: EmbeddingError;

  constructor(attempts: number, lastError: EmbeddingError) {
    super(`Embedding failed after ${attempts} attempts: ${lastError.message}`, {
      provider: lastError.provider,
      hint: 'Raise embedding.max_retry or check the provider status',
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
    this.cause = lastError;
  }
}

/**
 * The run was cancelled through its AbortSignal.
 */
export class CancelledError extends EmbeddingError {
  constructor() {
    super('Ingestion cancelled', { hint: 'The run was aborted before it finished' });
    this.name = 'CancelledError';
  }
}
