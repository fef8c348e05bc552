import type { TodoStore, TodoRecord } from '../storage/types.js';
import { StorageError } from '../storage/errors.js';
import { TasklaneRuntimeError } from '../errors/index.js';
import type { Logger } from '../logger/types.js';
import { TasklaneLogComponent } from '../logger/types.js';
import type { Todo, CreateTodoInput, UpdateTodoInput } from './types.js';
import { toTodo } from './types.js';
import { CreateTodoInputSchema, TodoIdSchema, UpdateTodoInputSchema } from './schemas.js';
import { TodoError } from './errors.js';

type StoreOperation = 'listAll' | 'getById' | 'create' | 'update' | 'deleteById' | 'deleteAll';

/**
 * TodoManager handles CRUD operations for todos
 *
 * Responsibilities:
 * - Validate create/update input
 * - Apply partial updates on top of the stored record
 * - Project stored records onto the wire shape
 *
 * Store failures surface as StorageError; input problems as a validation error;
 * operating on an absent id as TodoError.notFound.
 */
export class TodoManager {
    private logger: Logger;

    constructor(
        private store: TodoStore,
        logger: Logger
    ) {
        this.logger = logger.createChild(TasklaneLogComponent.TODO);
        this.logger.debug(`TodoManager initialized with ${store.getStoreType()} store`);
    }

    /**
     * All todos ordered by ascending id
     */
    async list(): Promise<Todo[]> {
        const records = await this.fromStore('listAll', () => this.store.listAll());
        return records.map(toTodo);
    }

    /**
     * Create a todo. New todos always start uncompleted.
     */
    async create(input: CreateTodoInput): Promise<Todo> {
        const parsed = CreateTodoInputSchema.safeParse(input);
        if (!parsed.success) {
            throw TodoError.validationFailed('create', parsed.error);
        }

        const record = await this.fromStore('create', () =>
            this.store.create({ text: parsed.data.text, is_completed: false })
        );
        this.logger.info(`Created todo: ${record.id}`);
        return toTodo(record);
    }

    /**
     * Update an existing todo. Only provided fields change.
     */
    async update(id: number, input: UpdateTodoInput): Promise<Todo> {
        const parsed = UpdateTodoInputSchema.safeParse(input);
        if (!parsed.success) {
            throw TodoError.validationFailed('update', parsed.error);
        }

        const existing = await this.load(id);
        const updated: TodoRecord = {
            ...existing,
            text: parsed.data.text !== undefined ? parsed.data.text : existing.text,
            is_completed:
                parsed.data.isCompleted !== undefined
                    ? parsed.data.isCompleted
                    : existing.is_completed,
        };

        const written = await this.fromStore('update', () => this.store.update(updated));
        if (!written) {
            // Removed between read and write
            throw TodoError.notFound(id);
        }

        this.logger.info(`Updated todo: ${id}`);
        return toTodo(updated);
    }

    async delete(id: number): Promise<void> {
        await this.load(id);

        const removed = await this.fromStore('deleteById', () => this.store.deleteById(id));
        if (!removed) {
            throw TodoError.notFound(id);
        }
        this.logger.info(`Deleted todo: ${id}`);
    }

    /**
     * Delete every todo. Succeeds on an empty collection.
     */
    async deleteAll(): Promise<number> {
        const count = await this.fromStore('deleteAll', () => this.store.deleteAll());
        this.logger.info(`Deleted all todos (${count})`);
        return count;
    }

    private async load(id: number): Promise<TodoRecord> {
        if (!TodoIdSchema.safeParse(id).success) {
            throw TodoError.invalidId(id);
        }

        const record = await this.fromStore('getById', () => this.store.getById(id));
        if (!record) {
            throw TodoError.notFound(id);
        }
        return record;
    }

    /**
     * Run a store call, normalising anything that isn't already a typed error
     */
    private async fromStore<T>(operation: StoreOperation, call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            if (error instanceof TasklaneRuntimeError) {
                throw error;
            }
            switch (operation) {
                case 'listAll':
                case 'getById':
                    throw StorageError.readFailed(operation, error);
                case 'deleteById':
                case 'deleteAll':
                    throw StorageError.deleteFailed(operation, error);
                default:
                    throw StorageError.writeFailed(operation, error);
            }
        }
    }
}
