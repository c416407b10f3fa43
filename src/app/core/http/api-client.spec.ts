import { HttpClient } from '@angular/common/http';
import { beforeEach, describe, expect, it } from 'vitest';
import { FakeHttpHandler } from '@testing/fake-http-handler';
import { ApiClient } from './api-client';
import type { ApiResult } from './api-result';

const ENDPOINT = 'https://api.example.test/session';

describe('ApiClient', () => {
  let handler: FakeHttpHandler;
  let client: ApiClient;
  let results: ApiResult<string>[];
  let completed: boolean;

  const collect = (result$: ReturnType<ApiClient['send']>): void => {
    result$.subscribe({
      next: (result) => results.push(result),
      complete: () => {
        completed = true;
      },
    });
  };

  beforeEach(() => {
    handler = new FakeHttpHandler();
    client = new ApiClient(new HttpClient(handler));
    results = [];
    completed = false;
  });

  it.each(['', 'not a url', '/api/auth/login', 'http://'])(
    'fails %j with "Invalid URL" without issuing a request',
    (url) => {
      collect(client.send({ url, method: 'POST', body: { email: 'a@b.com' } }));

      expect(results).toEqual([{ ok: false, message: 'Invalid URL' }]);
      expect(completed).toBe(true);
      expect(handler.requests).toHaveLength(0);
    },
  );

  it('issues one request with the given method, headers and JSON body', () => {
    collect(
      client.send({
        url: ENDPOINT,
        method: 'POST',
        headers: { 'content-type': 'application/json', 'x-client': 'test' },
        body: { email: 'a@b.com', password: 'x' },
      }),
    );

    expect(handler.requests).toHaveLength(1);
    const { request } = handler.last();
    expect(request.method).toBe('POST');
    expect(request.urlWithParams).toBe(ENDPOINT);
    expect(request.responseType).toBe('text');
    expect(request.headers.get('content-type')).toBe('application/json');
    expect(request.headers.get('x-client')).toBe('test');
    expect(request.serializeBody()).toBe('{"email":"a@b.com","password":"x"}');
  });

  it('sends no body when none is given', () => {
    collect(client.send({ url: ENDPOINT, method: 'GET' }));

    expect(handler.last().request.body).toBeNull();
  });

  it('reports the raw payload text on success', () => {
    collect(client.send({ url: ENDPOINT, method: 'POST', body: {} }));
    handler.last().flush('{"token":"abc123"}');

    expect(results).toEqual([{ ok: true, value: '{"token":"abc123"}' }]);
    expect(completed).toBe(true);
  });

  it('reports an empty payload for a response without a body', () => {
    collect(client.send({ url: ENDPOINT, method: 'DELETE' }));
    handler.last().flush(null, { status: 204, statusText: 'No Content' });

    expect(results).toEqual([{ ok: true, value: '' }]);
  });

  it('treats a completed exchange with an error status as a success', () => {
    collect(client.send({ url: ENDPOINT, method: 'POST', body: {} }));
    handler
      .last()
      .flush('{"message":"Invalid credentials"}', { status: 401, statusText: 'Unauthorized' });

    expect(results).toEqual([{ ok: true, value: '{"message":"Invalid credentials"}' }]);
    expect(completed).toBe(true);
  });

  it('reports an empty payload for an error status without a body', () => {
    collect(client.send({ url: ENDPOINT, method: 'POST', body: {} }));
    handler.last().flush(null, { status: 401, statusText: 'Unauthorized' });

    expect(results).toEqual([{ ok: true, value: '' }]);
    expect(completed).toBe(true);
  });

  it('fails with the transport diagnostic when the network is unreachable', () => {
    collect(client.send({ url: ENDPOINT, method: 'POST', body: {} }));
    handler.last().failNetwork();

    expect(results).toEqual([
      { ok: false, message: `Http failure response for ${ENDPOINT}: 0 Unknown Error` },
    ]);
    expect(completed).toBe(true);
  });

  it('fails with the error message when the handler throws', () => {
    collect(client.send({ url: ENDPOINT, method: 'POST', body: {} }));
    handler.last().fail(new Error('socket hang up'));

    expect(results).toEqual([{ ok: false, message: 'socket hang up' }]);
  });

  it('issues an independent request for every call', () => {
    collect(client.send({ url: ENDPOINT, method: 'POST', body: {} }));
    collect(client.send({ url: ENDPOINT, method: 'POST', body: {} }));

    expect(handler.requests).toHaveLength(2);
    expect(handler.requests[0]).not.toBe(handler.requests[1]);
  });
});
