import { existsSync } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { ErrorScope } from '../errors/types.js';
import type { Issue } from '../errors/types.js';
import type { EnvMap } from '../utils/env.js';
import { readBooleanEnv, readStringEnv } from '../utils/env.js';
import type { Result } from '../utils/result.js';
import { fail, ok, zodToIssues } from '../utils/result.js';
import type { TodoStoreConfig } from '../storage/schemas.js';
import { TokenConfigSchema } from '../token/schemas.js';
import type { ValidatedTokenConfig } from '../token/schemas.js';
import { AppConfigSchema } from './schemas.js';
import type { ValidatedAppConfig } from './schemas.js';
import { ConfigError } from './errors.js';

/**
 * Merge `<cwd>/.env` with the process environment.
 * Shell values win over the file; process.env is left untouched.
 */
export function loadEnvironment(
    cwd: string = process.cwd(),
    processEnv: EnvMap = process.env
): EnvMap {
    const env: EnvMap = {};

    const envPath = path.join(cwd, '.env');
    if (existsSync(envPath)) {
        const result = dotenv.config({ path: envPath, processEnv: {} });
        if (result.error) {
            throw ConfigError.envFileReadError(envPath, result.error);
        }
        Object.assign(env, result.parsed);
    }

    for (const [key, value] of Object.entries(processEnv)) {
        if (value !== undefined && value !== '') {
            env[key] = value;
        }
    }

    return env;
}

function storageFromEnv(env: EnvMap): TodoStoreConfig | undefined {
    const db = readStringEnv(env, 'TASKLANE_DB');
    if (db === undefined) return undefined;
    if (db === 'in-memory') return { type: 'in-memory' };
    return { type: 'sqlite', path: db };
}

// Values are passed through unchecked; AppConfigSchema rejects unknown levels and algorithms
function loggerFromEnv(env: EnvMap) {
    const level = readStringEnv(env, 'LOG_LEVEL');
    const file = readStringEnv(env, 'LOG_FILE');
    const transports: Array<Record<string, unknown>> = readBooleanEnv(env, 'LOG_SILENT', false)
        ? [{ type: 'silent' }]
        : [{ type: 'console', colorize: readBooleanEnv(env, 'LOG_COLOR', true) }];
    if (file) {
        transports.push({ type: 'file', path: file });
    }
    return { level, transports };
}

function hasTokenSettings(env: EnvMap): boolean {
    return (
        readStringEnv(env, 'JWT_ALGORITHM') !== undefined ||
        readStringEnv(env, 'SECRET_KEY') !== undefined
    );
}

/**
 * Build and validate the application config from an environment map.
 * Token settings are optional, but once either variable is set both must be valid.
 *
 * @throws TasklaneValidationError (ConfigErrorCode.INVALID_CONFIG) listing every invalid value
 */
export function loadAppConfig(env: EnvMap): ValidatedAppConfig {
    const origins = readStringEnv(env, 'ALLOWED_ORIGINS');
    const storage = storageFromEnv(env);

    const raw = {
        server: {
            port: readStringEnv(env, 'PORT'),
            hostname: readStringEnv(env, 'HOST'),
            allowedOrigins: origins
                ? origins
                      .split(',')
                      .map((o) => o.trim())
                      .filter((o) => o.length > 0)
                : [],
        },
        logger: loggerFromEnv(env),
        ...(storage ? { storage } : {}),
    };

    const parsed = AppConfigSchema.safeParse(raw);
    const issues: Issue[] = parsed.success
        ? []
        : zodToIssues(parsed.error, 'error', ErrorScope.CONFIG);

    let token: ValidatedTokenConfig | undefined;
    if (hasTokenSettings(env)) {
        const result = loadTokenConfig(env);
        if (result.ok) {
            token = result.data;
        } else {
            issues.push(
                ...result.issues.map((issue) => ({
                    ...issue,
                    path: ['token', ...(issue.path ?? [])],
                }))
            );
        }
    }

    if (!parsed.success || issues.length > 0) {
        throw ConfigError.invalid(issues);
    }
    return token ? { ...parsed.data, token } : parsed.data;
}

/**
 * Token settings only, as a Result so callers can check for them without throwing
 */
export function loadTokenConfig(env: EnvMap): Result<ValidatedTokenConfig> {
    const parsed = TokenConfigSchema.safeParse({
        algorithm: readStringEnv(env, 'JWT_ALGORITHM'),
        secret: readStringEnv(env, 'SECRET_KEY'),
    });
    if (!parsed.success) {
        return fail(zodToIssues(parsed.error, 'error', ErrorScope.TOKEN));
    }
    return ok(parsed.data);
}
