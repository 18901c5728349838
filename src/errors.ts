import type { SourceTag } from './types/index.js';

export type PipelineErrorKind =
  | 'MalformedIdentifier'
  | 'MalformedRecord'
  | 'SourceUnavailable'
  | 'Configuration'
  | 'PrecedenceConfiguration'
  | 'GenerationWrite';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A record's key fields cannot be brought into canonical form. */
export class MalformedIdentifierError extends PipelineError {
  readonly kind = 'MalformedIdentifier';

  constructor(
    readonly field: 'format_identifier' | 'property_identifier',
    readonly value: unknown,
    detail?: string
  ) {
    super(`Malformed ${field}: ${JSON.stringify(value) ?? String(value)}${detail ? ` (${detail})` : ''}`);
  }
}

/** A document is not a usable record at all (syntax error, wrong shape, unknown keys). */
export class MalformedRecordError extends PipelineError {
  readonly kind = 'MalformedRecord';
}

export class SourceUnavailableError extends PipelineError {
  readonly kind = 'SourceUnavailable';
  readonly sources: SourceTag[];
  readonly path?: string;

  constructor(
    message: string,
    details: { sources: SourceTag[]; path?: string },
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.sources = details.sources;
    this.path = details.path;
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind: PipelineErrorKind = 'Configuration';
}

/** The precedence order names an unknown source, repeats one or leaves one out. */
export class PrecedenceConfigurationError extends ConfigurationError {
  readonly kind = 'PrecedenceConfiguration';
}

export class GenerationWriteError extends PipelineError {
  readonly kind = 'GenerationWrite';

  constructor(readonly path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super(`Failed to write ${path}: ${reason}`, options);
  }
}

export type NormalizationError = MalformedIdentifierError | MalformedRecordError;

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return typeof error === 'string' ? error : JSON.stringify(error, null, 2);
}
