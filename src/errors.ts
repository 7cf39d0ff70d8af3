/**
 * Error taxonomy for upstream calls and the pipeline, plus the single place
 * where errors become HTTP statuses.
 */

export type UpstreamErrorKind =
  | 'Timeout'
  | 'Network'
  | 'UpstreamStatus'
  | 'InvalidContentType'
  | 'TooLarge';

export type FetchErrorKind = UpstreamErrorKind;
export type RescaleErrorKind = UpstreamErrorKind | 'UnsupportedVariant';
export type PipelineErrorKind = 'FetchFailed' | 'RescaleFailed' | 'Internal';

interface UpstreamErrorDetails {
  url?: string;
  status?: number;
  cause?: unknown;
}

/**
 * Failure of a single outbound HTTP call
 */
export abstract class UpstreamError<K extends string = string> extends Error {
  readonly kind: K;
  readonly url?: string;
  readonly status?: number;

  constructor(kind: K, message: string, details: UpstreamErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.kind = kind;
    this.url = details.url;
    this.status = details.status;
  }

  /** Timeouts and transport failures may succeed on a later attempt */
  get transient(): boolean {
    return this.kind === 'Timeout' || this.kind === 'Network';
  }
}

export class FetchError extends UpstreamError<FetchErrorKind> {
  override readonly name = 'FetchError';
}

export class RescaleError extends UpstreamError<RescaleErrorKind> {
  override readonly name = 'RescaleError';
}

/**
 * Outcome of a failed pipeline run, shared by every waiter on the key
 */
export class PipelineError extends Error {
  override readonly name = 'PipelineError';
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.kind = kind;
  }

  /** Kind of the upstream error behind this failure, if any */
  get upstreamKind(): RescaleErrorKind | undefined {
    const cause = this.cause;
    return cause instanceof FetchError || cause instanceof RescaleError ? cause.kind : undefined;
  }
}

/**
 * Malformed inbound request (unknown variant, bad origin URL)
 */
export class InvalidRequestError extends Error {
  override readonly name = 'InvalidRequestError';
}

export function isTransientError(error: unknown): boolean {
  return error instanceof UpstreamError && error.transient;
}

/**
 * Wrap a failure from one pipeline stage into the error every waiter sees
 */
export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  if (error instanceof FetchError) {
    return new PipelineError('FetchFailed', error.message, error);
  }
  if (error instanceof RescaleError) {
    return new PipelineError('RescaleFailed', error.message, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError('Internal', `Unexpected pipeline failure: ${message}`, error);
}

export type HttpStatus = 400 | 404 | 500 | 502 | 504;

/**
 * Map any error raised while serving an image to an HTTP status
 *
 * - InvalidRequestError: 400
 * - UnsupportedVariant: 404 (no such variant is served)
 * - Timeout upstream: 504
 * - any other upstream failure: 502
 * - everything else: 500
 */
export function statusFromError(error: unknown): HttpStatus {
  if (error instanceof InvalidRequestError) {
    return 400;
  }

  const upstreamKind =
    error instanceof PipelineError
      ? error.upstreamKind
      : error instanceof FetchError || error instanceof RescaleError
        ? error.kind
        : undefined;

  if (error instanceof PipelineError && error.kind === 'Internal') {
    return 500;
  }

  switch (upstreamKind) {
    case 'UnsupportedVariant':
      return 404;
    case 'Timeout':
      return 504;
    case undefined:
      return error instanceof PipelineError ? 502 : 500;
    default:
      return 502;
  }
}

/**
 * Short machine-readable code for error bodies
 */
export function errorCode(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.upstreamKind ?? error.kind;
  }
  if (error instanceof UpstreamError) {
    return error.kind;
  }
  if (error instanceof InvalidRequestError) {
    return 'InvalidRequest';
  }
  return 'Internal';
}
