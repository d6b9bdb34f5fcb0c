import type { HttpMethod } from '../types/index.js';

export interface ApiClient {
    readonly baseUrl: string;
    request: (method: HttpMethod, path: string, body?: unknown) => Promise<Response>;
    get: (path: string) => Promise<Response>;
    post: (path: string, body?: unknown) => Promise<Response>;
    delete: (path: string) => Promise<Response>;
}

export interface ApiClientOptions {
    baseUrl: string;

    /** Per-request timeout in milliseconds */
    timeout: number;
}

function getHeaders(): Record<string, string> {
    return { 'Content-Type': 'application/json', Accept: 'application/json' };
}

/**
 * Create a client bound to one base URL, e.g. http://localhost:5001/api
 */
export function createApiClient(options: ApiClientOptions): ApiClient {
    const baseUrl = options.baseUrl.replace(/\/+$/, '');

    const request = (method: HttpMethod, path: string, body?: unknown): Promise<Response> =>
        fetch(`${baseUrl}${path}`, {
            method,
            headers: getHeaders(),
            body: body !== undefined ? JSON.stringify(body) : undefined,
            signal: AbortSignal.timeout(options.timeout),
        });

    return {
        baseUrl,
        request,
        get: (path: string) => request('GET', path),
        post: (path: string, body?: unknown) => request('POST', path, body),
        delete: (path: string) => request('DELETE', path),
    };
}
