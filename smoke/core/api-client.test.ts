import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { createApiClient } from './api-client.js';

describe('API client', () => {
  let fetchSpy: Mock;

  beforeEach(() => {
    fetchSpy = vi.fn(async () => new Response('{"status":"success"}'));
    vi.stubGlobal('fetch', fetchSpy);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('joins paths to the base URL without doubling slashes', async () => {
    const client = createApiClient({ baseUrl: 'http://meals.test/api/', timeout: 1000 });

    await client.get('/health');

    expect(client.baseUrl).toBe('http://meals.test/api');
    expect(fetchSpy.mock.calls[0][0]).toBe('http://meals.test/api/health');
  });

  it('sends JSON bodies with a JSON content type', async () => {
    const client = createApiClient({ baseUrl: 'http://meals.test/api', timeout: 1000 });

    await client.post('/create-meal', { meal: 'Taco', price: 8.99 });

    const init = fetchSpy.mock.calls[0][1];
    expect(init.method).toBe('POST');
    expect(init.body).toBe('{"meal":"Taco","price":8.99}');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Accept: 'application/json' });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('sends no body for deletes', async () => {
    const client = createApiClient({ baseUrl: 'http://meals.test/api', timeout: 1000 });

    await client.delete('/delete-meal/1');

    const init = fetchSpy.mock.calls[0][1];
    expect(init.method).toBe('DELETE');
    expect(init.body).toBeUndefined();
  });
});
