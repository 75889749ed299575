// src/services/backend/BackendClient.ts

import { joinUrl, sendJson, type FetchFn } from '@/lib/api';
import {
    extractAccessToken,
    type ApiResult,
    type LoginRequest,
    type RegisterRequest,
    type ReportRequest,
} from '@/types/api';
import type { Credential, Identity, ReportResult, TargetStatus } from '@/types/models';

/**
 * Result of a login attempt
 */
export type LoginOutcome =
    | { kind: 'authenticated'; credential: Credential; response: ApiResult }
    | { kind: 'missing-token'; response: ApiResult };

export interface BackendClientOptions {
    fetch?: FetchFn;
}

/**
 * Client for the backend's auth and user-report endpoints.
 * HTTP error statuses come back as results; only transport failures throw (NetworkError).
 */
export class BackendClient {
    private baseUrl: string;
    private fetchFn?: FetchFn;

    constructor(baseUrl: string, options: BackendClientOptions = {}) {
        this.baseUrl = baseUrl;
        this.fetchFn = options.fetch;
    }

    private url(path: string): string {
        return joinUrl(this.baseUrl, path);
    }

    /**
     * POST /auth/register
     */
    async register(identity: Identity): Promise<ApiResult> {
        const body: RegisterRequest = {
            carnet: identity.carnet,
            nombre: identity.nombre,
            biografia: identity.biografia,
            fechaNacimiento: identity.fechaNacimiento,
            ciudad: identity.ciudad,
            foto: identity.foto,
            email: identity.email,
            password: identity.password,
        };

        return sendJson(this.url('/auth/register'), { body, fetch: this.fetchFn });
    }

    /**
     * POST /auth/login
     * A response without session.access_token is a 'missing-token' outcome whatever its status.
     */
    async login(identity: Pick<Identity, 'email' | 'password'>): Promise<LoginOutcome> {
        const body: LoginRequest = { email: identity.email, password: identity.password };
        const response = await sendJson(this.url('/auth/login'), { body, fetch: this.fetchFn });

        const accessToken = extractAccessToken(response.body);
        if (!accessToken) {
            return { kind: 'missing-token', response };
        }

        return {
            kind: 'authenticated',
            credential: { email: identity.email, accessToken },
            response,
        };
    }

    /**
     * POST /users/{targetId}/report with an empty body
     */
    async report(credential: Credential, targetId: string): Promise<ReportResult> {
        const body: ReportRequest = {};
        const response = await sendJson(
            this.url(`/users/${encodeURIComponent(targetId)}/report`),
            { body, token: credential.accessToken, fetch: this.fetchFn }
        );

        return {
            reporter: credential.email,
            targetId,
            status: response.status,
            body: response.body,
        };
    }

    /**
     * Log in as the target to see whether the report limit disabled it.
     * The backend answers 403 for a blocked account.
     */
    async probeTarget(email: string, password: string): Promise<{ status: TargetStatus; response: ApiResult }> {
        const outcome = await this.login({ email, password });
        const { response } = outcome;

        if (response.status === 403) {
            return { status: 'blocked', response };
        }
        if (outcome.kind === 'authenticated') {
            return { status: 'active', response };
        }
        return { status: 'unknown', response };
    }
}
