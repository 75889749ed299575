import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadEnv } from './load-env';

const KEYS = ['REPORT_FLOW_BASE_URL', 'REPORT_FLOW_TARGET_ID', 'REPORT_FLOW_PASSWORD'];

describe('loadEnv', () => {
    let dir: string;
    let saved: Record<string, string | undefined>;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'report-flow-env-'));
        saved = Object.fromEntries(KEYS.map((key) => [key, process.env[key]]));
        for (const key of KEYS) delete process.env[key];
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
        for (const key of KEYS) {
            const value = saved[key];
            if (value === undefined) delete process.env[key];
            else process.env[key] = value;
        }
    });

    it('lets the process environment win over both files', () => {
        process.env.REPORT_FLOW_TARGET_ID = 'from-process';
        writeFileSync(path.join(dir, '.env'), 'REPORT_FLOW_TARGET_ID=from-env-file\n');
        writeFileSync(path.join(dir, '.env.local'), 'REPORT_FLOW_TARGET_ID=from-local-file\n');

        loadEnv(dir);

        expect(process.env.REPORT_FLOW_TARGET_ID).toBe('from-process');
    });

    it('lets .env.local win over .env', () => {
        writeFileSync(
            path.join(dir, '.env'),
            'REPORT_FLOW_PASSWORD=env-secret\nREPORT_FLOW_BASE_URL=http://env.test\n'
        );
        writeFileSync(path.join(dir, '.env.local'), 'REPORT_FLOW_PASSWORD=local-secret\n');

        loadEnv(dir);

        expect(process.env.REPORT_FLOW_PASSWORD).toBe('local-secret');
        expect(process.env.REPORT_FLOW_BASE_URL).toBe('http://env.test');
    });

    it('does nothing when the files are missing', () => {
        loadEnv(dir);

        expect(process.env.REPORT_FLOW_PASSWORD).toBeUndefined();
    });
});
