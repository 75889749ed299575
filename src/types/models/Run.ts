// src/types/models/Run.ts

import type { TargetStatus } from './Report';

/**
 * Phases of one report-flow run, in order.
 * 'verifying' only happens when target credentials are configured.
 */
export type RunPhase =
    | 'start'
    | 'registering'
    | 'waiting'
    | 'authenticating'
    | 'reporting'
    | 'verifying'
    | 'done'
    | 'aborted';

/**
 * What a finished run did
 */
export interface RunSummary {
    phase: Extract<RunPhase, 'done' | 'aborted'>;
    registered: number;
    credentials: number;
    reports: number;

    // Set when the run aborted during authentication
    abortedBy?: string;

    targetStatus?: TargetStatus;
}
