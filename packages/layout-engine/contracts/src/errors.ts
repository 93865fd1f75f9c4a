export type LayoutErrorCode =
  | 'INVALID_STYLE'
  | 'MALFORMED_TABLE'
  | 'INVALID_ELEMENT'
  | 'COLLABORATOR_FAILURE'
  | 'INVALID_CONFIG'
  | 'LAYOUT_STALLED';

/**
 * Structured error raised by every layout package.
 *
 * Style and table errors are raised eagerly by the builders; collaborator
 * failures wrap the thrown value as `cause`.
 */
export class LayoutError extends Error {
  readonly code: LayoutErrorCode;
  readonly details?: unknown;

  constructor(code: LayoutErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LayoutError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, LayoutError.prototype);
  }
}

export function isLayoutError(error: unknown): error is LayoutError {
  return error instanceof LayoutError;
}
