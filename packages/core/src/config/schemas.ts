import { z } from 'zod';
import { LoggerConfigSchema } from '../logger/schemas.js';
import { TodoStoreConfigSchema } from '../storage/schemas.js';
import { TokenConfigSchema } from '../token/schemas.js';

export const ServerConfigSchema = z
    .object({
        port: z.coerce
            .number()
            .int()
            .min(0)
            .max(65535)
            .default(3000)
            .describe('Port to listen on'),
        hostname: z.string().min(1).default('0.0.0.0').describe('Interface to bind to'),
        allowedOrigins: z
            .array(z.string())
            .default([])
            .describe('Origins allowed by CORS in addition to localhost'),
    })
    .strict();

export type ValidatedServerConfig = z.output<typeof ServerConfigSchema>;

export const AppConfigSchema = z
    .object({
        server: ServerConfigSchema.default({}),
        storage: TodoStoreConfigSchema.default({ type: 'in-memory' }),
        logger: LoggerConfigSchema.default({}),
        token: TokenConfigSchema.optional().describe(
            'Token codec settings; absent when neither JWT_ALGORITHM nor SECRET_KEY is set'
        ),
    })
    .strict()
    .describe('Process-wide configuration, built once at startup');

export type AppConfig = z.input<typeof AppConfigSchema>;
export type ValidatedAppConfig = z.output<typeof AppConfigSchema>;
