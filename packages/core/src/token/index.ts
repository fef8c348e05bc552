export { TokenCodec, createTokenCodec } from './codec.js';
export {
    TOKEN_ALGORITHMS,
    TokenConfigSchema,
    ClaimsSchema,
    ClaimValueSchema,
    type TokenAlgorithm,
    type TokenConfig,
    type ValidatedTokenConfig,
    type Claims,
} from './schemas.js';
export { TokenError, type InvalidTokenReason } from './errors.js';
export { TokenErrorCode } from './error-codes.js';
