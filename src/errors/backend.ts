import { AtlasError } from './base.js';

/** An embedding backend request failed (network error or non-OK HTTP status). */
export class BackendError extends AtlasError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'BACKEND_ERROR', cause);
  }
}
