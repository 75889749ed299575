// src/services/backend/index.ts

export { BackendClient } from './BackendClient';
export type { BackendClientOptions, LoginOutcome } from './BackendClient';
