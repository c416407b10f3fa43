import {
  type ApiFailure,
  type ApiResult,
  describeError,
  failure,
  success,
} from '@core/http/api-result';
import type { LoginParameters, LoginRequest, LoginResponse } from './auth.types';

const DECODE_ERROR_PREFIX = 'Unable to decode login response';

export function toLoginParameters(request: LoginRequest): LoginParameters {
  const parameters: LoginParameters = {};

  if (request.email !== undefined) {
    parameters.email = request.email;
  }

  if (request.password !== undefined) {
    parameters.password = request.password;
  }

  return parameters;
}

/**
 * Decodes a login payload. Anything other than a JSON object carrying a string
 * `token` is a failure; a partially populated response is never produced.
 */
export function decodeLoginResponse(payload: string): ApiResult<LoginResponse> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    return decodeFailure(describeError(error));
  }

  if (!isRecord(parsed)) {
    return decodeFailure('expected a JSON object');
  }

  const token = parsed['token'];
  if (typeof token !== 'string') {
    return decodeFailure('"token" must be a string');
  }

  return success({ token });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeFailure(reason: string): ApiFailure {
  return failure(`${DECODE_ERROR_PREFIX}: ${reason}`);
}
