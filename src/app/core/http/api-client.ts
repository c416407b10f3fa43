import { Injectable } from '@angular/core';
import { HttpClient, HttpErrorResponse, HttpHeaders } from '@angular/common/http';
import { Observable, catchError, map, of } from 'rxjs';
import {
  type ApiResult,
  INVALID_URL_MESSAGE,
  describeError,
  failure,
  success,
} from './api-result';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ApiRequest {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  /** Serialized as JSON by HttpClient. Omit to send no body. */
  body?: object;
}

/**
 * Performs a single HTTP exchange and reports the raw payload text.
 *
 * Status codes are not interpreted: any exchange that produced a response counts as
 * a success, and only transport-level errors (status 0, thrown errors) fail.
 */
@Injectable({
  providedIn: 'root',
})
export class ApiClient {
  constructor(private readonly http: HttpClient) {}

  send(request: ApiRequest): Observable<ApiResult<string>> {
    if (!isAbsoluteUrl(request.url)) {
      return of(failure(INVALID_URL_MESSAGE));
    }

    return this.http
      .request(request.method, request.url, {
        body: request.body,
        headers: new HttpHeaders(request.headers ?? {}),
        responseType: 'text',
      })
      .pipe(
        map((payload): ApiResult<string> => success(payload ?? '')),
        catchError((error: unknown) => of(this.classifyError(error))),
      );
  }

  private classifyError(error: unknown): ApiResult<string> {
    if (!(error instanceof HttpErrorResponse)) {
      return failure(describeError(error));
    }

    if (error.status !== 0) {
      return success(typeof error.error === 'string' ? error.error : '');
    }

    return failure(error.message);
  }
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
