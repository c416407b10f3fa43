export const INVALID_URL_MESSAGE = 'Invalid URL';

export interface ApiSuccess<T> {
  ok: true;
  value: T;
}

export interface ApiFailure {
  ok: false;
  message: string;
}

export type ApiResult<T> = ApiSuccess<T> | ApiFailure;

export function success<T>(value: T): ApiSuccess<T> {
  return { ok: true, value };
}

export function failure(message: string): ApiFailure {
  return { ok: false, message };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : String(error);
}
