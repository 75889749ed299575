// src/types/models/Identity.ts

/**
 * Reporter account registered against the backend.
 * Field names match the backend's sign-up body.
 */
export interface Identity {
    carnet: string;
    nombre: string;
    biografia: string;
    fechaNacimiento: string;
    ciudad: string;
    foto: string;
    email: string;
    password: string;
}

/**
 * Placeholder profile values for reporter accounts
 */
export const DEFAULT_IDENTITY_PROFILE = {
    carnet: '0',
    biografia: 'reporter',
    fechaNacimiento: '1990-01-01',
    ciudad: 'Ciudad',
    foto: '',
} as const satisfies Partial<Identity>;

/**
 * Build a reporter identity; the display name is the email's local part
 */
export function buildIdentity(email: string, password: string): Identity {
    const at = email.indexOf('@');
    const nombre = at === -1 ? email : email.slice(0, at);

    return {
        ...DEFAULT_IDENTITY_PROFILE,
        nombre,
        email,
        password,
    };
}
