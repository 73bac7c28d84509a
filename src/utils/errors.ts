/**
 * Error taxonomy for an assembly run. Every error names the stage it came from
 * and carries enough structured detail (asset, segment, tool diagnostic) to
 * reproduce the failure from the logs alone.
 */

export type AssemblyStage = 'input' | 'render' | 'plan' | 'compose' | 'verify';

export class AssemblyError extends Error {
  constructor(
    message: string,
    public readonly stage: AssemblyStage,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AssemblyError';
  }
}

/** Malformed segments, bad run parameters or an unprobeable asset. Raised before any media work. */
export class InputError extends AssemblyError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'input', details, options);
    this.name = 'InputError';
  }
}

export class RenderError extends AssemblyError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'render', details, options);
    this.name = 'RenderError';
  }
}

export interface CompositionFailure {
  diagnostic: string;
  exitCode: number | null;
  timedOut: boolean;
}

export class CompositionError extends AssemblyError {
  public readonly diagnostic: string;
  public readonly exitCode: number | null;
  public readonly timedOut: boolean;

  constructor(message: string, failure: CompositionFailure, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'compose', { ...details, exitCode: failure.exitCode, timedOut: failure.timedOut }, options);
    this.name = 'CompositionError';
    this.diagnostic = failure.diagnostic;
    this.exitCode = failure.exitCode;
    this.timedOut = failure.timedOut;
  }
}

export type IntegrityDefect =
  | 'duration-mismatch'
  | 'stream-mismatch'
  | 'frozen-frame'
  | 'sampling-failed'
  | 'audio-clipping'
  | 'audio-silent';

/** The file exists but must not be published. */
export class IntegrityError extends AssemblyError {
  constructor(
    message: string,
    public readonly code: IntegrityDefect,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, 'verify', { ...details, code }, options);
    this.name = 'IntegrityError';
  }
}
