import { dirname } from 'path';
import { mkdirSync } from 'fs';
import Database from 'better-sqlite3';
import type {
    Logger,
    NewTodoRecord,
    SqliteTodoStoreConfig,
    TodoRecord,
    TodoStore,
} from '@tasklane/core';
import { StorageError, TasklaneLogComponent } from '@tasklane/core';

/** Row as stored; SQLite has no boolean column type */
type TodoRow = {
    id: number;
    text: string;
    is_completed: number;
};

function fromRow(row: TodoRow): TodoRecord {
    return { id: row.id, text: row.text, is_completed: row.is_completed !== 0 };
}

/**
 * SQLite todo store backed by better-sqlite3.
 * AUTOINCREMENT keeps ids unique for the lifetime of the database file, even after deletes.
 */
export class SqliteTodoStore implements TodoStore {
    private db: Database.Database | null = null;
    private logger: Logger;

    constructor(
        private config: SqliteTodoStoreConfig,
        logger: Logger
    ) {
        this.logger = logger.createChild(TasklaneLogComponent.STORAGE);
    }

    async connect(): Promise<void> {
        if (this.db) return;

        const { path, options } = this.config;
        const inMemory = path === ':memory:';
        this.logger.info(`SQLite using database file: ${path}`);

        try {
            if (!inMemory && !options.readonly) {
                mkdirSync(dirname(path), { recursive: true });
            }
            this.db = new Database(path, {
                readonly: options.readonly,
                fileMustExist: options.fileMustExist,
                timeout: options.timeout,
            });
        } catch (error) {
            throw StorageError.connectionFailed(
                error instanceof Error ? error.message : String(error),
                error
            );
        }

        if (!options.readonly) {
            // WAL lets readers proceed while a write is in progress
            this.db.pragma('journal_mode = WAL');
            this.initializeTables(this.db);
        }

        this.logger.info(`SQLite store connected: ${path}`);
    }

    async disconnect(): Promise<void> {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    isConnected(): boolean {
        return this.db !== null;
    }

    getStoreType(): string {
        return 'sqlite';
    }

    async listAll(): Promise<TodoRecord[]> {
        const db = this.getDb();
        try {
            return db
                .prepare<[], TodoRow>('SELECT id, text, is_completed FROM todos ORDER BY id ASC')
                .all()
                .map(fromRow);
        } catch (error) {
            throw StorageError.readFailed('listAll', error);
        }
    }

    async getById(id: number): Promise<TodoRecord | undefined> {
        const db = this.getDb();
        try {
            const row = db
                .prepare<[number], TodoRow>('SELECT id, text, is_completed FROM todos WHERE id = ?')
                .get(id);
            return row ? fromRow(row) : undefined;
        } catch (error) {
            throw StorageError.readFailed('getById', error, { id });
        }
    }

    async create(record: NewTodoRecord): Promise<TodoRecord> {
        const db = this.getDb();
        try {
            const result = db
                .prepare<[string, number]>('INSERT INTO todos (text, is_completed) VALUES (?, ?)')
                .run(record.text, record.is_completed ? 1 : 0);
            return { id: Number(result.lastInsertRowid), ...record };
        } catch (error) {
            throw StorageError.writeFailed('create', error);
        }
    }

    async update(record: TodoRecord): Promise<boolean> {
        const db = this.getDb();
        try {
            const result = db
                .prepare<[string, number, number]>(
                    'UPDATE todos SET text = ?, is_completed = ? WHERE id = ?'
                )
                .run(record.text, record.is_completed ? 1 : 0, record.id);
            return result.changes > 0;
        } catch (error) {
            throw StorageError.writeFailed('update', error, { id: record.id });
        }
    }

    async deleteById(id: number): Promise<boolean> {
        const db = this.getDb();
        try {
            const result = db.prepare<[number]>('DELETE FROM todos WHERE id = ?').run(id);
            return result.changes > 0;
        } catch (error) {
            throw StorageError.deleteFailed('deleteById', error, { id });
        }
    }

    async deleteAll(): Promise<number> {
        const db = this.getDb();
        try {
            return db.prepare<[]>('DELETE FROM todos').run().changes;
        } catch (error) {
            throw StorageError.deleteFailed('deleteAll', error);
        }
    }

    private initializeTables(db: Database.Database): void {
        this.logger.debug('SQLite initializing database schema...');
        try {
            db.exec(`
                CREATE TABLE IF NOT EXISTS todos (
                    id INTEGER PRIMARY KEY AUTOINCREMENT,
                    text TEXT NOT NULL,
                    is_completed INTEGER NOT NULL DEFAULT 0
                )
            `);
        } catch (error) {
            throw StorageError.migrationFailed(error, { operation: 'table_initialization' });
        }
    }

    private getDb(): Database.Database {
        if (!this.db) {
            throw StorageError.notConnected('SqliteTodoStore');
        }
        return this.db;
    }
}
