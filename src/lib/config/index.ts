// src/lib/config/index.ts

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigError } from '@/lib/api/errors';

export { loadEnv } from './load-env';

/**
 * Defaults for a run against a local backend
 */
export const DEFAULT_RUN_CONFIG = {
    baseUrl: 'http://127.0.0.1:8000',
    targetId: 'e689565b-b607-4900-b890-b30903a61e3b',
    password: '123456',
    reporters: [
        'reporter1+dev@example.com',
        'reporter2+dev@example.com',
        'reporter3+dev@example.com',
    ],
    delayMs: 1000,
};

export const runConfigSchema = z
    .object({
        baseUrl: z.string().url('Base URL must be a valid URL'),
        targetId: z.string().trim().min(1, 'Target id is required'),
        password: z.string().min(1, 'Password is required'),
        reporters: z
            .array(z.string().email('Invalid reporter email'))
            .min(1, 'At least one reporter is required'),
        // Blank strings would coerce to 0
        delayMs: z.preprocess(
            (value) => (typeof value === 'string' && value.trim() === '' ? Number.NaN : value),
            z.coerce
                .number({ invalid_type_error: 'Delay must be a number' })
                .int('Delay must be a whole number of milliseconds')
                .min(0, 'Delay cannot be negative')
        ),
        targetEmail: z.string().email('Invalid target email').optional(),
        targetPassword: z.string().min(1).optional(),
    })
    .refine((c) => (c.targetEmail === undefined) === (c.targetPassword === undefined), {
        message: 'Target email and target password must be given together',
        path: ['targetEmail'],
    });

export type RunConfig = z.infer<typeof runConfigSchema>;

/**
 * Unvalidated settings from one source
 */
export interface RawRunConfig {
    baseUrl?: string;
    targetId?: string;
    password?: string;
    reporters?: string[];
    delayMs?: string | number;
    targetEmail?: string;
    targetPassword?: string;
}

export const USAGE = `Usage: report-flow [options]

Registers reporter accounts, logs them in and files one report per reporter
against the target account.

Options:
  --base-url <url>          Backend base URL (REPORT_FLOW_BASE_URL)
  --target-id <id>          Account to report (REPORT_FLOW_TARGET_ID)
  --password <pw>           Password shared by all reporters (REPORT_FLOW_PASSWORD)
  --reporter <email>        Reporter email, repeatable (REPORT_FLOW_REPORTERS, comma-separated)
  --delay-ms <n>            Wait after registration, 0 disables (REPORT_FLOW_DELAY_MS)
  --target-email <email>    Target login, enables the blocked check (REPORT_FLOW_TARGET_EMAIL)
  --target-password <pw>    Target password (REPORT_FLOW_TARGET_PASSWORD)
  -h, --help                Show this help`;

function nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === '' ? undefined : value;
}

function splitList(value: string | undefined): string[] | undefined {
    const list = nonEmpty(value)
        ?.split(',')
        .map((item) => item.trim())
        .filter(Boolean);
    return list && list.length > 0 ? list : undefined;
}

/**
 * Read settings from environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): RawRunConfig {
    return {
        baseUrl: nonEmpty(env.REPORT_FLOW_BASE_URL),
        targetId: nonEmpty(env.REPORT_FLOW_TARGET_ID),
        password: nonEmpty(env.REPORT_FLOW_PASSWORD),
        reporters: splitList(env.REPORT_FLOW_REPORTERS),
        delayMs: nonEmpty(env.REPORT_FLOW_DELAY_MS),
        targetEmail: nonEmpty(env.REPORT_FLOW_TARGET_EMAIL),
        targetPassword: nonEmpty(env.REPORT_FLOW_TARGET_PASSWORD),
    };
}

function parseFlags(argv: string[]) {
    return parseArgs({
        args: argv,
        options: {
            'base-url': { type: 'string' },
            'target-id': { type: 'string' },
            password: { type: 'string' },
            reporter: { type: 'string', multiple: true },
            'delay-ms': { type: 'string' },
            'target-email': { type: 'string' },
            'target-password': { type: 'string' },
            help: { type: 'boolean', short: 'h', default: false },
        },
        strict: true,
        allowPositionals: false,
    });
}

/**
 * Read settings from command-line flags
 */
export function readCliConfig(argv: string[]): { config: RawRunConfig; help: boolean } {
    let parsed: ReturnType<typeof parseFlags>;
    try {
        parsed = parseFlags(argv);
    } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error));
    }

    const { values } = parsed;
    const reporters = values.reporter;

    return {
        help: values.help ?? false,
        config: {
            baseUrl: values['base-url'],
            targetId: values['target-id'],
            password: values.password,
            reporters: reporters && reporters.length > 0 ? reporters : undefined,
            delayMs: values['delay-ms'],
            targetEmail: values['target-email'],
            targetPassword: values['target-password'],
        },
    };
}

/**
 * Merge sources (defaults < env < flags) and validate.
 * A setting left undefined by a later source keeps the earlier value.
 */
export function resolveRunConfig(...sources: RawRunConfig[]): RunConfig {
    const layers: RawRunConfig[] = [DEFAULT_RUN_CONFIG, ...sources];
    const pick = <K extends keyof RawRunConfig>(key: K): RawRunConfig[K] =>
        layers.reduce<RawRunConfig[K]>((value, layer) => layer[key] ?? value, undefined);

    const parsed = runConfigSchema.safeParse({
        baseUrl: pick('baseUrl'),
        targetId: pick('targetId'),
        password: pick('password'),
        reporters: pick('reporters'),
        delayMs: pick('delayMs'),
        targetEmail: pick('targetEmail'),
        targetPassword: pick('targetPassword'),
    });

    if (!parsed.success) {
        const message = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(message, parsed.error.issues);
    }

    return parsed.data;
}
