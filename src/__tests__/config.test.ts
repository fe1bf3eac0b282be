import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEnvVars, resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'collabmap-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe('loadEnvVars', () => {
        it('should read OpenAlex access and target settings', () => {
            expect(loadEnvVars({
                OPENALEX_EMAIL: 'test@example.org',
                OPENALEX_API_KEY: 'test-key',
                COLLABMAP_TARGET_ROR: 'https://ror.org/env-ror',
            })).toEqual({
                email: 'test@example.org',
                apiKey: 'test-key',
                targetRor: 'https://ror.org/env-ror',
            });
        });

        it('should ignore unset and empty variables', () => {
            expect(loadEnvVars({ OPENALEX_EMAIL: '' })).toEqual({});
        });
    });

    describe('resolveConfig', () => {
        it('should fall back to defaults without a config file', async () => {
            const config = await resolveConfig({}, { searchFrom: dir, env: {} });
            expect(config).toEqual(DEFAULT_CONFIG);
        });

        it('should merge file, env and CLI flags in order of precedence', async () => {
            writeFileSync(
                join(dir, 'collabmap.config.json'),
                JSON.stringify({
                    targetRor: 'https://ror.org/file-ror',
                    worksPath: 'file/works.json',
                    perPage: 50,
                    logLevel: 'warn',
                }),
                'utf-8'
            );

            const config = await resolveConfig(
                { logLevel: 'debug', worksPath: undefined },
                { searchFrom: dir, env: { COLLABMAP_TARGET_ROR: 'https://ror.org/env-ror' } }
            );

            expect(config.targetRor).toBe('https://ror.org/env-ror');
            expect(config.worksPath).toBe('file/works.json');
            expect(config.perPage).toBe(50);
            expect(config.logLevel).toBe('debug');
            expect(config.datasetsOut).toBe(DEFAULT_CONFIG.datasetsOut);
        });

        it('should take the log settings from the file when no flag is given', async () => {
            writeFileSync(
                join(dir, 'collabmap.config.json'),
                JSON.stringify({ logLevel: 'warn', jsonLogs: true }),
                'utf-8'
            );

            const config = await resolveConfig(
                { logLevel: undefined, jsonLogs: undefined },
                { searchFrom: dir, env: {} }
            );

            expect(config.logLevel).toBe('warn');
            expect(config.jsonLogs).toBe(true);
        });

        it('should reject an unknown log level from the file', async () => {
            writeFileSync(join(dir, 'collabmap.config.json'), JSON.stringify({ logLevel: 'verbose' }), 'utf-8');

            await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toThrow(
                'Invalid log level: verbose. Valid: error, warn, info, debug, silent'
            );
        });
    });
});
