/**
 * Fatal error categories.
 *
 * - structural: the document is missing something a slice needs
 *   (Bounds, the selected canvas)
 * - validation: the named shapes cannot be exported together
 * - precondition: the environment is not ready (output path, source image, crop tool)
 * - execution: the crop tool failed on a shape
 */
export type SliceErrorKind =
  | "structural"
  | "validation"
  | "precondition"
  | "execution";

export interface SliceErrorOptions {
  /** Shape names the error is about (duplicate names) */
  names?: string[];
  cause?: unknown;
}

/** A fatal condition that aborts the run */
export class SliceError extends Error {
  readonly kind: SliceErrorKind;
  readonly names: string[];

  constructor(kind: SliceErrorKind, message: string, options: SliceErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SliceError";
    this.kind = kind;
    this.names = options.names ?? [];
  }
}

/** Render any thrown value as a one-line message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
