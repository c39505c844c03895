/**
 * Error taxonomy shared by the store, the models and the HTTP layer
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_REQUEST"
  | "STORE_UNAVAILABLE"
  | "MODEL_NOT_READY"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

export class AppError extends Error {
  readonly status: number;
  readonly code: ErrorCode;

  constructor(message: string, status: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/** Malformed request input or invalid model configuration */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

/** Request rejected before it reached a handler (body too large, bad encoding) */
export class RequestError extends AppError {
  constructor(message: string, status: number) {
    super(message, status, "INVALID_REQUEST");
  }
}

/** Backing database unreachable, timed out, or failing */
export class StoreUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, "STORE_UNAVAILABLE", { cause });
  }
}

/** No trained snapshot and on-demand training is off */
export class ModelNotReadyError extends AppError {
  constructor(message = "Recommendation model has not been trained yet") {
    super(message, 503, "MODEL_NOT_READY");
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Race a promise against a deadline
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
