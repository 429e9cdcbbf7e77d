export interface ErrorPayload {
  kind: string;
  message: string;
}

export class AtlasError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorPayload {
    return { kind: this.code, message: this.message };
  }
}

/** Structured `{kind, message}` view of any thrown value. */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof AtlasError) return err.toJSON();
  if (err instanceof Error) return { kind: 'INTERNAL_ERROR', message: err.message };
  return { kind: 'INTERNAL_ERROR', message: String(err) };
}
