import { z } from 'zod';

export const TODO_STORE_TYPES = ['in-memory', 'sqlite'] as const;
export type TodoStoreType = (typeof TODO_STORE_TYPES)[number];

export const InMemoryTodoStoreSchema = z
    .object({
        type: z.literal('in-memory'),
    })
    .strict()
    .describe('Ephemeral store; records are lost when the process exits');

export type InMemoryTodoStoreConfig = z.output<typeof InMemoryTodoStoreSchema>;

export const SqliteTodoStoreSchema = z
    .object({
        type: z.literal('sqlite'),
        path: z.string().min(1).describe('SQLite database file path, or ":memory:"'),
        options: z
            .object({
                readonly: z.boolean().default(false),
                fileMustExist: z.boolean().default(false),
                timeout: z.number().int().positive().default(5000).describe('Busy timeout in ms'),
            })
            .strict()
            .default({}),
    })
    .strict()
    .describe('SQLite store backed by better-sqlite3');

export type SqliteTodoStoreConfig = z.output<typeof SqliteTodoStoreSchema>;

export const TodoStoreConfigSchema = z
    .discriminatedUnion('type', [InMemoryTodoStoreSchema, SqliteTodoStoreSchema])
    .describe('Record store configuration');

export type TodoStoreConfig = z.input<typeof TodoStoreConfigSchema>;
export type ValidatedTodoStoreConfig = z.output<typeof TodoStoreConfigSchema>;
