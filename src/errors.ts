/**
 * Error type for per-document extraction failures.
 *
 * Core accessors never throw; these errors are collected as diagnostics on
 * the parser and in the corpus coverage report.
 */

export type ExtractionStage = "read" | "parse" | "detect" | "extract" | "analyze";

export class ExtractionError extends Error {
  readonly stage: ExtractionStage;
  readonly path: string | null;

  constructor(
    message: string,
    stage: ExtractionStage,
    options: { path?: string | null; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ExtractionError";
    this.stage = stage;
    this.path = options.path ?? null;
  }
}

/** Error message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
