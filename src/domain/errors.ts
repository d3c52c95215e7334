/**
 * Typed error model for machine-actionable error handling.
 *
 * Failures travel as values carrying a TypedError rather than as thrown
 * exceptions, so the run result can say exactly what stopped the pipeline.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIG'
  | 'GENERATION'
  | 'ARTIFACT'
  | 'SYSTEM';

/** Typed suggested fix that an operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure carried in results and log entries. */
export interface TypedError {
  /** Namespaced error code (e.g., "GENERATION.PROVIDER"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Pipeline step the error belongs to, if any. */
  stepId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stepId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stepId: params.stepId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract the domain prefix of an error code ("CONFIG.INVALID" → "CONFIG"). */
export function errorDomain(error: TypedError): ErrorDomain {
  const prefix = error.code.split('.')[0];
  switch (prefix) {
    case 'CONFIG':
    case 'GENERATION':
    case 'ARTIFACT':
      return prefix;
    default:
      return 'SYSTEM';
  }
}

/** Best-effort message of an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'unknown error';
}

// --- Common error factory functions ---

export function missingCredentialError(envVars: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.MISSING_CREDENTIAL',
    message: `${envVars.join(' or ')} environment variable not set`,
    retryable: false,
    details: { envVars },
    suggestedFixes: envVars.map((key) => ({
      type: 'PROVIDE_SECRET',
      params: { key },
      description: `Export ${key} before running`,
    })),
  });
}

export function invalidConfigError(errors: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message: `Invalid configuration: ${errors.join('; ')}`,
    retryable: false,
    details: { errors },
  });
}

export function configFileError(filePath: string, reason: string): TypedError {
  return createTypedError({
    code: 'CONFIG.FILE',
    message: `Failed to load config file ${filePath}: ${reason}`,
    retryable: false,
    details: { filePath },
    suggestedFixes: [
      { type: 'FIX_CONFIG_FILE', params: { filePath }, description: 'Provide a JSON or YAML mapping of settings' },
    ],
  });
}

export function generationProviderError(message: string, statusCode?: number): TypedError {
  return createTypedError({
    code: 'GENERATION.PROVIDER',
    message,
    retryable: statusCode ? statusCode >= 500 || statusCode === 429 : true,
    details: { statusCode },
    suggestedFixes: [
      { type: 'CHECK_API_KEY', params: {} },
      { type: 'WAIT_AND_RETRY', params: { delayMs: 2000 } },
    ],
  });
}

export function unexpectedGenerationError(message: string): TypedError {
  return createTypedError({
    code: 'GENERATION.UNEXPECTED',
    message,
    retryable: false,
  });
}

export function artifactWriteError(path: string, message: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.WRITE',
    message: `Failed to write ${path}: ${message}`,
    retryable: false,
    details: { path },
    suggestedFixes: [
      { type: 'CHECK_PERMISSIONS', params: { path } },
    ],
  });
}
