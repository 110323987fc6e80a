import type { ZodError } from 'zod';

export type PorkbunOperation = 'ping' | 'retrieve' | 'create' | 'editByNameType';

/**
 * Failure of a single Porkbun API call.
 *
 * `status` is set whenever an HTTP response arrived; `body` holds the raw
 * response text for non-200 responses.
 */
export class PorkbunApiError extends Error {
  readonly operation: PorkbunOperation;
  readonly status?: number;
  readonly body?: string;

  constructor(
    message: string,
    details: {
      operation: PorkbunOperation;
      status?: number;
      body?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = 'PorkbunApiError';
    this.operation = details.operation;
    this.status = details.status;
    this.body = details.body;
  }
}

export type DynDnsErrorCode =
  | 'invalid-check-url'
  | 'ping-failed'
  | 'lookup-failed'
  | 'invalid-ip'
  | 'update-failed'
  | 'timeout';

/** A condition that ends a dynamic DNS run without touching the record */
export class DynDnsError extends Error {
  constructor(
    readonly code: DynDnsErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DynDnsError';
  }
}

/** Invalid configuration file or command-line options */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `path: message; path: message` for every issue of a zod error */
export function formatZodError(error: ZodError): string {
  return error.errors
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
