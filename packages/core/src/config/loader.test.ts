import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { loadAppConfig, loadEnvironment, loadTokenConfig } from './loader.js';
import { TasklaneValidationError } from '../errors/index.js';
import { ConfigErrorCode } from './error-codes.js';

describe('loadAppConfig', () => {
    it('should apply defaults for an empty environment', () => {
        expect(loadAppConfig({})).toEqual({
            server: { port: 3000, hostname: '0.0.0.0', allowedOrigins: [] },
            storage: { type: 'in-memory' },
            logger: { level: 'info', transports: [{ type: 'console', colorize: true }] },
        });
    });

    it('should read server settings', () => {
        const config = loadAppConfig({
            PORT: '8080',
            HOST: '127.0.0.1',
            ALLOWED_ORIGINS: 'https://a.example, https://b.example,',
        });

        expect(config.server).toEqual({
            port: 8080,
            hostname: '127.0.0.1',
            allowedOrigins: ['https://a.example', 'https://b.example'],
        });
    });

    it('should select sqlite for any TASKLANE_DB other than in-memory', () => {
        expect(loadAppConfig({ TASKLANE_DB: 'in-memory' }).storage).toEqual({
            type: 'in-memory',
        });
        expect(loadAppConfig({ TASKLANE_DB: './data/todos.db' }).storage).toEqual({
            type: 'sqlite',
            path: './data/todos.db',
            options: { readonly: false, fileMustExist: false, timeout: 5000 },
        });
    });

    it('should build logger transports from the environment', () => {
        const config = loadAppConfig({
            LOG_LEVEL: 'debug',
            LOG_COLOR: 'false',
            LOG_FILE: '/tmp/tasklane.log',
        });

        expect(config.logger).toEqual({
            level: 'debug',
            transports: [
                { type: 'console', colorize: false },
                {
                    type: 'file',
                    path: '/tmp/tasklane.log',
                    maxSize: 10 * 1024 * 1024,
                    maxFiles: 5,
                },
            ],
        });
    });

    it('should replace the console with a silent transport when LOG_SILENT is set', () => {
        expect(loadAppConfig({ LOG_SILENT: 'true' }).logger.transports).toEqual([
            { type: 'silent' },
        ]);
    });

    it('should include token settings when present', () => {
        expect(
            loadAppConfig({ JWT_ALGORITHM: 'HS512', SECRET_KEY: 'test-secret' }).token
        ).toEqual({ algorithm: 'HS512', secret: 'test-secret' });
    });

    it('should reject a partial token configuration', () => {
        try {
            loadAppConfig({ JWT_ALGORITHM: 'HS256' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(TasklaneValidationError);
            if (error instanceof TasklaneValidationError) {
                expect(error.errors.map((issue) => issue.path)).toEqual([['token', 'secret']]);
                expect(error.errors[0]?.code).toBe(ConfigErrorCode.INVALID_CONFIG);
            }
        }
    });

    it('should report server and token problems together', () => {
        try {
            loadAppConfig({ PORT: 'not-a-port', JWT_ALGORITHM: 'none', SECRET_KEY: 'test-secret' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(TasklaneValidationError);
            if (error instanceof TasklaneValidationError) {
                expect(error.errors.map((issue) => issue.path)).toEqual([
                    ['server', 'port'],
                    ['token', 'algorithm'],
                ]);
            }
        }
    });

    it('should report every invalid value with its path', () => {
        try {
            loadAppConfig({ PORT: 'not-a-port', LOG_LEVEL: 'loud' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(TasklaneValidationError);
            if (error instanceof TasklaneValidationError) {
                expect(error.errors.map((issue) => issue.code)).toEqual([
                    ConfigErrorCode.INVALID_CONFIG,
                    ConfigErrorCode.INVALID_CONFIG,
                ]);
                expect(error.errors.map((issue) => issue.path)).toEqual([
                    ['server', 'port'],
                    ['logger', 'level'],
                ]);
                expect(error.errors[0]?.message).toMatch(/^server\.port: /);
            }
        }
    });
});

describe('loadTokenConfig', () => {
    it('should return the validated config', () => {
        expect(loadTokenConfig({ JWT_ALGORITHM: 'HS256', SECRET_KEY: 'test-secret' })).toEqual({
            ok: true,
            data: { algorithm: 'HS256', secret: 'test-secret' },
            issues: [],
        });
    });

    it('should report missing values without throwing', () => {
        const result = loadTokenConfig({});

        expect(result.ok).toBe(false);
        expect(result.issues.map((issue) => issue.path)).toEqual([['algorithm'], ['secret']]);
    });
});

describe('loadEnvironment', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'tasklane-env-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should read the .env file', () => {
        writeFileSync(path.join(dir, '.env'), 'PORT=4000\nSECRET_KEY=test-secret\n');

        expect(loadEnvironment(dir, {})).toEqual({ PORT: '4000', SECRET_KEY: 'test-secret' });
    });

    it('should let shell values win over the file', () => {
        writeFileSync(path.join(dir, '.env'), 'PORT=4000\n');

        expect(loadEnvironment(dir, { PORT: '5000', HOST: '' })).toEqual({ PORT: '5000' });
    });

    it('should work without a .env file', () => {
        expect(loadEnvironment(dir, { LOG_LEVEL: 'warn' })).toEqual({ LOG_LEVEL: 'warn' });
    });

    it('should not modify the process environment', () => {
        writeFileSync(path.join(dir, '.env'), 'TASKLANE_ENV_MARKER=1\n');

        loadEnvironment(dir, {});

        expect(process.env.TASKLANE_ENV_MARKER).toBeUndefined();
    });
});
