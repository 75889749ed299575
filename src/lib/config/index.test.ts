import { describe, it, expect } from 'vitest';
import { ConfigError } from '@/lib/api';
import { DEFAULT_RUN_CONFIG, readCliConfig, readEnvConfig, resolveRunConfig } from './index';

describe('resolveRunConfig', () => {
    it('falls back to the defaults', () => {
        expect(resolveRunConfig()).toEqual({
            baseUrl: 'http://127.0.0.1:8000',
            targetId: 'e689565b-b607-4900-b890-b30903a61e3b',
            password: '123456',
            reporters: DEFAULT_RUN_CONFIG.reporters,
            delayMs: 1000,
        });
    });

    it('lets flags override env and env override defaults', () => {
        const env = readEnvConfig({
            REPORT_FLOW_BASE_URL: 'http://env.test',
            REPORT_FLOW_PASSWORD: 'env-secret',
            REPORT_FLOW_REPORTERS: ' x@example.com , y@example.com,',
            REPORT_FLOW_DELAY_MS: '250',
        });
        const { config: flags } = readCliConfig(['--base-url', 'http://flags.test', '--delay-ms', '0']);

        const config = resolveRunConfig(env, flags);

        expect(config.baseUrl).toBe('http://flags.test');
        expect(config.password).toBe('env-secret');
        expect(config.reporters).toEqual(['x@example.com', 'y@example.com']);
        expect(config.delayMs).toBe(0);
        expect(config.targetId).toBe(DEFAULT_RUN_CONFIG.targetId);
    });

    it('collects repeated --reporter flags in order', () => {
        const { config } = readCliConfig(['--reporter', 'b@example.com', '--reporter', 'a@example.com']);

        expect(resolveRunConfig(config).reporters).toEqual(['b@example.com', 'a@example.com']);
    });

    it('ignores empty env values', () => {
        const env = readEnvConfig({ REPORT_FLOW_BASE_URL: '', REPORT_FLOW_REPORTERS: ' , ' });

        expect(resolveRunConfig(env).baseUrl).toBe(DEFAULT_RUN_CONFIG.baseUrl);
        expect(resolveRunConfig(env).reporters).toEqual(DEFAULT_RUN_CONFIG.reporters);
    });

    it('accepts target credentials given together', () => {
        const config = resolveRunConfig({ targetEmail: 'victim@example.com', targetPassword: 'test-secret' });

        expect(config.targetEmail).toBe('victim@example.com');
        expect(config.targetPassword).toBe('test-secret');
    });

    it('rejects a negative delay', () => {
        expect(() => resolveRunConfig({ delayMs: '-5' })).toThrow(
            new ConfigError('delayMs: Delay cannot be negative')
        );
    });

    it('rejects a blank delay flag instead of treating it as 0', () => {
        expect(() => resolveRunConfig(readCliConfig(['--delay-ms', '']).config)).toThrow(
            new ConfigError('delayMs: Delay must be a number')
        );
        expect(() => resolveRunConfig(readCliConfig(['--delay-ms', '  ']).config)).toThrow(ConfigError);
    });

    it('rejects a target email without password', () => {
        expect(() => resolveRunConfig({ targetEmail: 'victim@example.com' })).toThrow(
            'targetEmail: Target email and target password must be given together'
        );
    });

    it('rejects an invalid reporter email', () => {
        expect(() => resolveRunConfig({ reporters: ['not-an-email'] })).toThrow(
            'reporters.0: Invalid reporter email'
        );
    });

    it('rejects a base URL that is not a URL', () => {
        expect(() => resolveRunConfig({ baseUrl: 'localhost' })).toThrow(ConfigError);
    });
});

describe('readCliConfig', () => {
    it('reports --help', () => {
        expect(readCliConfig(['-h']).help).toBe(true);
        expect(readCliConfig([]).help).toBe(false);
    });

    it('turns unknown flags into a ConfigError', () => {
        expect(() => readCliConfig(['--victim', 'x'])).toThrow(ConfigError);
    });
});
