// src/types/models/index.ts

// Identity models
export type { Identity } from './Identity';
export { DEFAULT_IDENTITY_PROFILE, buildIdentity } from './Identity';

// Credential models
export type { Credential } from './Credential';

// Report models
export type { ReportResult, TargetStatus } from './Report';

// Run models
export type { RunPhase, RunSummary } from './Run';
