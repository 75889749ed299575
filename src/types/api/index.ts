// src/types/api/index.ts

import { z } from 'zod';

/**
 * Decoded HTTP response as returned by the backend client.
 * Bodies are JSON when they parse, raw text otherwise, null when empty.
 */
export interface ApiResult<T = unknown> {
    status: number;
    ok: boolean;
    body: T;
}

// ============================================
// Auth API Schemas
// ============================================

export const registerRequestSchema = z.object({
    carnet: z.string(),
    nombre: z.string().min(1, 'Name is required'),
    biografia: z.string(),
    fechaNacimiento: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Birth date must be YYYY-MM-DD'),
    ciudad: z.string(),
    foto: z.string(),
    email: z.string().email('Invalid email address'),
    password: z.string().min(1, 'Password is required'),
});

export type RegisterRequest = z.infer<typeof registerRequestSchema>;

export const loginRequestSchema = z.object({
    email: z.string().email('Invalid email address'),
    password: z.string().min(1, 'Password is required'),
});

export type LoginRequest = z.infer<typeof loginRequestSchema>;

/**
 * Login response; only the session token is read, everything else passes through.
 * A missing or empty token is not a decode error.
 */
export const loginResponseSchema = z
    .object({
        session: z
            .object({
                access_token: z.string().optional(),
            })
            .passthrough()
            .nullish(),
    })
    .passthrough();

// ============================================
// User API Schemas
// ============================================

/**
 * Report body; the backend takes an empty object
 */
export const reportRequestSchema = z.object({}).strict();

export type ReportRequest = z.infer<typeof reportRequestSchema>;

/**
 * Read the bearer token out of a login body, if there is one
 */
export function extractAccessToken(body: unknown): string | null {
    const parsed = loginResponseSchema.safeParse(body);
    if (!parsed.success) return null;

    const token = parsed.data.session?.access_token;
    return token ? token : null;
}
