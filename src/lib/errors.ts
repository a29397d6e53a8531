export type RecipeCardErrorCode =
  | "MALFORMED_CONTAINER"
  | "MISSING_DOCUMENT_BODY"
  | "MALFORMED_DOCUMENT_BODY"
  | "CACHE_UNAVAILABLE"
  | "INDEX_OPERATION_FAILED"
  | "PERSISTENCE_FAILED"
  | "CORPUS_UNAVAILABLE";

/**
 * Error raised by every stage of the recipe pipeline.
 *
 * The `code` tells callers how far the failure reaches: container and body
 * errors drop a single document, cache and index errors are reported and the
 * pass continues, and only `CORPUS_UNAVAILABLE` ends a run.
 */
export class RecipeCardError extends Error {
  public readonly code: RecipeCardErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: RecipeCardErrorCode,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown> } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "RecipeCardError";
    this.code = code;
    this.details = options.details;
  }
}

export function isRecipeCardError(error: unknown, code?: RecipeCardErrorCode): error is RecipeCardError {
  return error instanceof RecipeCardError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
