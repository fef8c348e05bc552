import type { NewTodoRecord, TodoRecord, TodoStore } from '@tasklane/core';
import { StorageError } from '@tasklane/core';

/**
 * In-memory todo store for development and testing.
 * Ids keep increasing across deletes, matching a database sequence.
 * Data is lost when the process restarts.
 */
export class MemoryTodoStore implements TodoStore {
    private records = new Map<number, TodoRecord>();
    private lastId = 0;
    private connected = false;

    async connect(): Promise<void> {
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        this.connected = false;
        this.records.clear();
        this.lastId = 0;
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoreType(): string {
        return 'in-memory';
    }

    async listAll(): Promise<TodoRecord[]> {
        this.checkConnection();
        return Array.from(this.records.values())
            .sort((a, b) => a.id - b.id)
            .map((record) => ({ ...record }));
    }

    async getById(id: number): Promise<TodoRecord | undefined> {
        this.checkConnection();
        const record = this.records.get(id);
        return record ? { ...record } : undefined;
    }

    async create(record: NewTodoRecord): Promise<TodoRecord> {
        this.checkConnection();
        this.lastId += 1;
        const created: TodoRecord = {
            id: this.lastId,
            text: record.text,
            is_completed: record.is_completed,
        };
        this.records.set(created.id, created);
        return { ...created };
    }

    async update(record: TodoRecord): Promise<boolean> {
        this.checkConnection();
        if (!this.records.has(record.id)) {
            return false;
        }
        this.records.set(record.id, { ...record });
        return true;
    }

    async deleteById(id: number): Promise<boolean> {
        this.checkConnection();
        return this.records.delete(id);
    }

    async deleteAll(): Promise<number> {
        this.checkConnection();
        const count = this.records.size;
        this.records.clear();
        return count;
    }

    private checkConnection(): void {
        if (!this.connected) {
            throw StorageError.notConnected('MemoryTodoStore');
        }
    }
}
