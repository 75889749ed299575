// src/lib/api/base.ts

import type { ApiResult } from '@/types/api';
import { NetworkError } from './errors';
import { ApiResponse } from './response';

export type FetchFn = typeof fetch;

/**
 * Options for a JSON request
 */
export interface JsonRequestOptions {
    method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
    /** Serialized with JSON.stringify */
    body?: unknown;
    /** Sent as `Authorization: Bearer <token>` */
    token?: string;
    fetch?: FetchFn;
}

/**
 * Build the Authorization header value for a bearer token
 */
export function bearer(token: string): string {
    return `Bearer ${token}`;
}

/**
 * Join a base URL and a path without doubling slashes
 */
export function joinUrl(baseUrl: string, path: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * Send a JSON request and decode the response.
 * HTTP error statuses are returned, not thrown; transport failures, including a body
 * that cannot be read, throw NetworkError.
 */
export async function sendJson(url: string, options: JsonRequestOptions = {}): Promise<ApiResult> {
    const { method = 'POST', body, token, fetch: fetchFn = fetch } = options;

    const headers: Record<string, string> = {
        'Content-Type': 'application/json',
    };
    if (token) {
        headers['Authorization'] = bearer(token);
    }

    try {
        const res = await fetchFn(url, {
            method,
            headers,
            body: body === undefined ? undefined : JSON.stringify(body),
        });

        // Reading the body can fail too if the connection drops mid-response
        return await ApiResponse.decode(res);
    } catch (error) {
        throw new NetworkError(url, error);
    }
}
