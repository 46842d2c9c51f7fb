export class AppError extends Error {
  readonly code: string;
  /** Extra structured data for logs (e.g. status, tileId, month). */
  readonly details: Record<string, unknown>;

  constructor(code: string, message: string, cause?: unknown, details?: Record<string, unknown>) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.code = code;
    this.details = details ?? {};
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

/** Short, loggable description of anything that was thrown. */
export const describeError = (error: unknown): string => {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
