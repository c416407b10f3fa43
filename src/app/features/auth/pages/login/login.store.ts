import { Injectable, computed, signal } from '@angular/core';
import { AuthService } from '@core/auth/auth.service';
import type { LoginResponse } from '@core/auth/auth.types';
import { type ApiResult, describeError, failure } from '@core/http/api-result';

export type LoginStatus = 'idle' | 'submitting' | 'succeeded' | 'failed';

export interface LoginState {
  email?: string;
  password?: string;
  lastResponse: LoginResponse | null;
  lastError: string | null;
  pendingRequests: number;
}

const INITIAL_STATE: LoginState = {
  email: undefined,
  password: undefined,
  lastResponse: null,
  lastError: null,
  pendingRequests: 0,
};

/**
 * View model behind the login form.
 *
 * Holds the entered credentials and the outcome of the most recently completed
 * submission. Overlapping submissions are not coordinated: whichever completes last
 * wins, regardless of the order they were issued in.
 */
@Injectable({
  providedIn: 'root',
})
export class LoginStore {
  private readonly stateSig = signal<LoginState>(INITIAL_STATE);

  readonly state = computed(() => this.stateSig());
  readonly email = computed(() => this.stateSig().email);
  readonly password = computed(() => this.stateSig().password);
  readonly lastResponse = computed(() => this.stateSig().lastResponse);
  readonly lastError = computed(() => this.stateSig().lastError);
  readonly pendingRequests = computed(() => this.stateSig().pendingRequests);
  readonly isSubmitting = computed(() => this.stateSig().pendingRequests > 0);
  readonly token = computed(() => this.stateSig().lastResponse?.token ?? null);
  readonly isAuthenticated = computed(() => !!this.token());
  readonly status = computed<LoginStatus>(() => {
    const { pendingRequests, lastResponse, lastError } = this.stateSig();

    if (pendingRequests > 0) {
      return 'submitting';
    }
    if (lastResponse) {
      return 'succeeded';
    }
    return lastError !== null ? 'failed' : 'idle';
  });

  constructor(private readonly authService: AuthService) {}

  setEmail(email: string | undefined): void {
    this.stateSig.update((current) => ({ ...current, email }));
  }

  setPassword(password: string | undefined): void {
    this.stateSig.update((current) => ({ ...current, password }));
  }

  submit(): void {
    const { email, password } = this.stateSig();

    this.stateSig.update((current) => ({
      ...current,
      pendingRequests: current.pendingRequests + 1,
    }));

    this.authService.login({ email, password }).subscribe({
      next: (result) => this.applyResult(result),
      error: (error: unknown) => this.applyResult(failure(describeError(error))),
    });
  }

  /** Clears credentials and outcome. Requests already in flight still land when they complete. */
  reset(): void {
    this.stateSig.update((current) => ({
      ...INITIAL_STATE,
      pendingRequests: current.pendingRequests,
    }));
  }

  private applyResult(result: ApiResult<LoginResponse>): void {
    if (!result.ok) {
      console.error('Failed to sign in', result.message);
    }

    this.stateSig.update((current) => ({
      ...current,
      lastResponse: result.ok ? result.value : null,
      lastError: result.ok ? null : result.message,
      pendingRequests: Math.max(current.pendingRequests - 1, 0),
    }));
  }
}
