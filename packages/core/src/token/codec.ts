import { decode as decodeJwt, sign, verify } from 'hono/jwt';
import type { Logger } from '../logger/types.js';
import { TasklaneLogComponent } from '../logger/types.js';
import { ConfigError } from '../config/errors.js';
import { zodToIssues } from '../utils/result.js';
import { ErrorScope } from '../errors/types.js';
import { ClaimsSchema, TokenConfigSchema } from './schemas.js';
import type { Claims, TokenConfig, ValidatedTokenConfig } from './schemas.js';
import { TokenError } from './errors.js';

type JwtPayload = Parameters<typeof sign>[0];

/**
 * Signs claims into a JWT and verifies them back.
 *
 * Holds no state besides its configuration. Errors are never collapsed:
 * every decode failure is a TokenErrorCode.INVALID_TOKEN error.
 */
export class TokenCodec {
    private logger: Logger | undefined;

    constructor(
        private readonly config: ValidatedTokenConfig,
        logger?: Logger
    ) {
        this.logger = logger?.createChild(TasklaneLogComponent.TOKEN);
    }

    get algorithm(): ValidatedTokenConfig['algorithm'] {
        return this.config.algorithm;
    }

    async encode(claims: Claims): Promise<string> {
        const parsed = ClaimsSchema.safeParse(claims);
        if (!parsed.success) {
            throw TokenError.invalidClaims(parsed.error.issues[0]?.message ?? 'invalid claims');
        }

        const payload: JwtPayload = {};
        for (const [key, value] of Object.entries(parsed.data)) {
            payload[key] = value;
        }

        const token = await sign(payload, this.config.secret, this.config.algorithm);
        this.logger?.debug('Encoded token', { claims: Object.keys(parsed.data) });
        return token;
    }

    async decode(token: string): Promise<Claims> {
        let algorithm: string;
        try {
            algorithm = decodeJwt(token).header.alg;
        } catch (error) {
            this.logger?.debug('Rejected malformed token');
            throw TokenError.malformed(error);
        }

        if (algorithm !== this.config.algorithm) {
            this.logger?.debug(`Rejected token signed with ${algorithm}`);
            throw TokenError.algorithmMismatch(algorithm, this.config.algorithm);
        }

        let payload: unknown;
        try {
            payload = await verify(token, this.config.secret, this.config.algorithm);
        } catch (error) {
            this.logger?.debug('Rejected token that failed verification');
            throw TokenError.verificationFailed(error);
        }

        const parsed = ClaimsSchema.safeParse(payload);
        if (!parsed.success) {
            throw TokenError.malformed(parsed.error);
        }
        return parsed.data;
    }
}

/**
 * Build a codec, validating the configuration up front so a missing or
 * unsupported algorithm or an empty secret fails at startup rather than first use.
 */
export function createTokenCodec(config: TokenConfig, logger?: Logger): TokenCodec {
    const parsed = TokenConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw ConfigError.invalid(zodToIssues(parsed.error, 'error', ErrorScope.TOKEN));
    }
    return new TokenCodec(parsed.data, logger);
}
