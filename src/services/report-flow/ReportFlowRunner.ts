// src/services/report-flow/ReportFlowRunner.ts

import { setTimeout as delay } from 'node:timers/promises';
import { ApiError, ApiResponse, MissingTokenError } from '@/lib/api';
import type { BackendClient } from '@/services/backend';
import type {
    Credential,
    Identity,
    ReportResult,
    RunPhase,
    RunSummary,
    TargetStatus,
} from '@/types/models';

export type Printer = Pick<Console, 'log' | 'error'>;

export type Sleep = (ms: number) => Promise<void>;

export interface ReportFlowOptions {
    targetId: string;
    /** Reporters, in the order they register, log in and report */
    identities: Identity[];
    /** Pause between registration and login; 0 skips it */
    delayMs: number;
    /** Target's own login, used to check whether it got blocked */
    target?: { email: string; password: string };
    printer?: Printer;
    sleep?: Sleep;
}

export const COMPLETION_REMINDER =
    'Done. Now check the backend store to confirm the target account is blocked (is_blocked).';

/**
 * Registers every reporter, waits, logs them all in, then files one report per credential.
 *
 * Registration and report failures are printed and skipped. A login without a token
 * aborts the run before any further login or report.
 */
export class ReportFlowRunner {
    private client: BackendClient;
    private options: ReportFlowOptions;
    private printer: Printer;
    private sleep: Sleep;
    private currentPhase: RunPhase = 'start';

    constructor(client: BackendClient, options: ReportFlowOptions) {
        this.client = client;
        this.options = options;
        this.printer = options.printer ?? console;
        this.sleep = options.sleep ?? ((ms) => delay(ms));
    }

    get phase(): RunPhase {
        return this.currentPhase;
    }

    private banner(title: string): void {
        this.printer.log(`=== ${title} ===`);
    }

    private printBody(body: unknown): void {
        this.printer.log(ApiResponse.format(body));
        this.printer.log('');
    }

    /**
     * Register one reporter. Returns false when the request itself failed;
     * an HTTP error status (e.g. account already exists) still counts as sent.
     */
    async register(identity: Identity): Promise<boolean> {
        this.banner(`Register ${identity.email}`);

        try {
            const response = await this.client.register(identity);
            this.printBody(response.body);
            return true;
        } catch (error) {
            if (!(error instanceof ApiError)) throw error;
            this.printer.error(`WARN: ${error.message}`);
            this.printer.log('');
            return false;
        }
    }

    async waitForPropagation(): Promise<void> {
        if (this.options.delayMs > 0) {
            await this.sleep(this.options.delayMs);
        }
    }

    /**
     * Log in one reporter; throws MissingTokenError when the body has no session.access_token
     */
    async login(identity: Identity): Promise<Credential> {
        this.banner(`Login ${identity.email}`);

        const outcome = await this.client.login(identity);
        this.printer.log(ApiResponse.format(outcome.response.body));

        if (outcome.kind === 'missing-token') {
            throw new MissingTokenError(
                identity.email,
                outcome.response.status,
                outcome.response.body
            );
        }

        this.printer.log('');
        return outcome.credential;
    }

    /**
     * File one report; returns null when the request itself failed
     */
    async report(credential: Credential, index: number): Promise<ReportResult | null> {
        this.banner(`Report ${index} from ${credential.email}`);

        try {
            const result = await this.client.report(credential, this.options.targetId);
            this.printBody(result.body);
            return result;
        } catch (error) {
            if (!(error instanceof ApiError)) throw error;
            this.printer.error(`WARN: ${error.message}`);
            this.printer.log('');
            return null;
        }
    }

    private async verifyTarget(target: { email: string; password: string }): Promise<TargetStatus> {
        this.banner(`Verify target ${this.options.targetId}`);

        try {
            const { status, response } = await this.client.probeTarget(target.email, target.password);
            this.printBody(response.body);
            this.printer.log(`Target status: ${status}`);
            return status;
        } catch (error) {
            if (!(error instanceof ApiError)) throw error;
            this.printer.error(`WARN: ${error.message}`);
            this.printer.log('Target status: unknown');
            return 'unknown';
        }
    }

    /**
     * Run every phase. An unexpected error leaves the runner in 'aborted' and is rethrown.
     */
    async run(): Promise<RunSummary> {
        try {
            return await this.runPhases();
        } catch (error) {
            this.currentPhase = 'aborted';
            throw error;
        }
    }

    private async runPhases(): Promise<RunSummary> {
        const { identities, target } = this.options;

        this.currentPhase = 'registering';
        let registered = 0;
        for (const identity of identities) {
            if (await this.register(identity)) registered++;
        }

        this.currentPhase = 'waiting';
        await this.waitForPropagation();

        this.currentPhase = 'authenticating';
        const credentials: Credential[] = [];
        for (const identity of identities) {
            try {
                credentials.push(await this.login(identity));
            } catch (error) {
                if (!(error instanceof ApiError)) throw error;
                this.printer.error(`ERROR: ${error.message}`);
                this.currentPhase = 'aborted';
                return {
                    phase: 'aborted',
                    registered,
                    credentials: credentials.length,
                    reports: 0,
                    abortedBy: identity.email,
                };
            }
        }

        this.currentPhase = 'reporting';
        let reports = 0;
        for (const [i, credential] of credentials.entries()) {
            if (await this.report(credential, i + 1)) reports++;
        }

        let targetStatus: TargetStatus | undefined;
        if (target) {
            this.currentPhase = 'verifying';
            targetStatus = await this.verifyTarget(target);
        }

        this.printer.log(COMPLETION_REMINDER);
        this.currentPhase = 'done';

        return {
            phase: 'done',
            registered,
            credentials: credentials.length,
            reports,
            ...(targetStatus && { targetStatus }),
        };
    }
}
