export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  VALIDATION = 'VALIDATION',
  RATE_LIMITED = 'RATE_LIMITED',
  BAD_REQUEST = 'BAD_REQUEST',
  CONFLICT = 'CONFLICT',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.safeMeta = safeMeta;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
