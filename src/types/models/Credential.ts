// src/types/models/Credential.ts

/**
 * Bearer credential obtained by logging in one identity
 */
export interface Credential {
    email: string;
    accessToken: string;
}
