// src/types/models/Report.ts

/**
 * Outcome of one report submission, kept for display only
 */
export interface ReportResult {
    reporter: string;
    targetId: string;
    status: number;
    body: unknown;
}

/**
 * Moderation state of the target as seen through its own login.
 * The backend refuses a blocked account's login with 403.
 */
export type TargetStatus = 'blocked' | 'active' | 'unknown';
