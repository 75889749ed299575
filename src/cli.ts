// src/cli.ts

import { ConfigError } from '@/lib/api';
import { USAGE, readCliConfig, readEnvConfig, resolveRunConfig, type RunConfig } from '@/lib/config';
import { BackendClient, type BackendClientOptions } from '@/services/backend';
import { ReportFlowRunner, type Printer, type Sleep } from '@/services/report-flow';
import { buildIdentity } from '@/types/models';

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_CONFIG = 2;

/**
 * Collaborators the CLI would otherwise take from the process
 */
export interface CliContext {
    env?: NodeJS.ProcessEnv;
    printer?: Printer;
    sleep?: Sleep;
    fetch?: BackendClientOptions['fetch'];
}

/**
 * Build a runner for a validated configuration
 */
export function createRunner(config: RunConfig, context: CliContext = {}): ReportFlowRunner {
    const client = new BackendClient(config.baseUrl, { fetch: context.fetch });
    const target =
        config.targetEmail !== undefined && config.targetPassword !== undefined
            ? { email: config.targetEmail, password: config.targetPassword }
            : undefined;

    return new ReportFlowRunner(client, {
        targetId: config.targetId,
        identities: config.reporters.map((email) => buildIdentity(email, config.password)),
        delayMs: config.delayMs,
        target,
        printer: context.printer,
        sleep: context.sleep,
    });
}

/**
 * Run the report flow for the given arguments and return the process exit code
 */
export async function main(argv: string[], context: CliContext = {}): Promise<number> {
    const printer = context.printer ?? console;

    let config: RunConfig;
    try {
        const cli = readCliConfig(argv);
        if (cli.help) {
            printer.log(USAGE);
            return EXIT_OK;
        }
        config = resolveRunConfig(readEnvConfig(context.env ?? process.env), cli.config);
    } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        printer.error(`Invalid configuration: ${error.message}`);
        printer.error(USAGE);
        return EXIT_CONFIG;
    }

    const summary = await createRunner(config, context).run();
    return summary.phase === 'done' ? EXIT_OK : EXIT_ABORTED;
}
