import { Injectable } from '@angular/core';
import { Observable, map } from 'rxjs';
import { environment } from '@env';
import { ApiClient } from '@core/http/api-client';
import type { ApiResult } from '@core/http/api-result';
import { decodeLoginResponse, toLoginParameters } from './auth.codec';
import type { LoginRequest, LoginResponse } from './auth.types';

@Injectable({
  providedIn: 'root',
})
export class AuthService {
  private readonly loginEndpoint = `${environment.apiUrl}/auth/login`;

  constructor(private readonly api: ApiClient) {}

  login(request: LoginRequest): Observable<ApiResult<LoginResponse>> {
    return this.api
      .send({
        url: this.loginEndpoint,
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: toLoginParameters(request),
      })
      .pipe(map((result) => (result.ok ? decodeLoginResponse(result.value) : result)));
  }
}
