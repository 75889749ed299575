// src/lib/api/response.ts

import type { ApiResult } from '@/types/api';

/**
 * Helpers for turning fetch responses into printable results
 */
export class ApiResponse {
    /**
     * Decode a response body: JSON when it parses, raw text otherwise, null when empty
     */
    static async decode(res: Response): Promise<ApiResult> {
        const text = await res.text();

        return {
            status: res.status,
            ok: res.ok,
            body: ApiResponse.parseBody(text),
        };
    }

    static parseBody(text: string): unknown {
        if (text.trim() === '') return null;

        try {
            return JSON.parse(text);
        } catch {
            return text;
        }
    }

    /**
     * Pretty-print a decoded body the way `jq` shows it
     */
    static format(body: unknown): string {
        if (typeof body === 'string') return body;
        return JSON.stringify(body, null, 2) ?? 'null';
    }
}
