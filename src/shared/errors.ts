/**
 * Render Errors
 *
 * Every failure the pipeline raises carries a category so the batch runner
 * can decide whether it is row-local and how to report it:
 *   - configuration: bad input shape (missing column, bad pattern, bad template name)
 *   - resolution:    template file missing or in an unsupported format
 *   - conversion:    external engine failed or produced nothing
 */

export type ErrorCategory = "configuration" | "resolution" | "conversion";

export abstract class RenderError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends RenderError {
  readonly category = "configuration";
}

export class ResolutionError extends RenderError {
  readonly category = "resolution";
}

export class UnsupportedFormatError extends RenderError {
  readonly category = "resolution";

  constructor(readonly extension: string) {
    super(`Unsupported template extension: ${extension || "(none)"}`);
  }
}

export class ConversionError extends RenderError {
  readonly category = "conversion";

  constructor(
    message: string,
    readonly diagnostics: { command?: string; stdout?: string; stderr?: string } = {},
  ) {
    super(message);
  }
}

export class MissingArtifactError extends RenderError {
  readonly category = "conversion";

  constructor(readonly expectedPath: string, what: string) {
    super(`${what}: expected artifact not produced at ${expectedPath}`);
  }
}

/** Render any thrown value as a single-line diagnostic. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
