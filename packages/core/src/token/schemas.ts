import { z } from 'zod';

/** HMAC algorithms; the codec signs with a shared secret */
export const TOKEN_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export const TokenConfigSchema = z
    .object({
        algorithm: z.enum(TOKEN_ALGORITHMS).describe('Signing algorithm'),
        secret: z.string().min(1, 'Token secret cannot be empty').describe('Shared secret'),
    })
    .strict()
    .describe('Token codec configuration');

export type TokenConfig = z.input<typeof TokenConfigSchema>;
export type ValidatedTokenConfig = z.output<typeof TokenConfigSchema>;

// Finite only: JSON would turn Infinity and NaN into null
export const ClaimValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const ClaimsSchema = z.record(ClaimValueSchema).describe('Arbitrary token claims');

export type Claims = z.output<typeof ClaimsSchema>;
