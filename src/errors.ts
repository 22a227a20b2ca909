/**
 * Error taxonomy for the highlight pipeline.
 *
 * Per-unit errors (FetchError, TranscodeError during normalization, ProbeError)
 * are caught by the stage that raised the unit of work, logged, and skipped.
 * EmptyPoolError, InsufficientMaterialError and ConfigurationError abort the run.
 */

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or unsupported configuration. Raised before any I/O. */
export class ConfigurationError extends PipelineError {}

/** A local file could not be read or written. */
export class IOError extends PipelineError {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class FetchError extends PipelineError {
  constructor(message: string, public readonly locator: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TranscodeError extends PipelineError {
  constructor(message: string, public readonly label: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ProbeError extends PipelineError {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EmptyPoolError extends PipelineError {
  constructor(public readonly aspectRatio: string) {
    super(`No media assets in pool for aspect ratio ${aspectRatio}`);
  }
}

export class InsufficientMaterialError extends PipelineError {
  constructor(
    message: string,
    public readonly accumulatedSeconds: number,
    public readonly targetSeconds: number,
  ) {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
