import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { TodoStore } from '@tasklane/core';
import { StorageErrorCode } from '@tasklane/core';
import { createSilentMockLogger } from '@tasklane/core/test-utils';
import { MemoryTodoStore } from './memory-todo-store.js';
import { SqliteTodoStore } from './sqlite-todo-store.js';

const stores: Array<[string, () => TodoStore]> = [
    ['MemoryTodoStore', () => new MemoryTodoStore()],
    [
        'SqliteTodoStore',
        () =>
            new SqliteTodoStore(
                {
                    type: 'sqlite',
                    path: ':memory:',
                    options: { readonly: false, fileMustExist: false, timeout: 5000 },
                },
                createSilentMockLogger()
            ),
    ],
];

describe.each(stores)('%s', (_name, createStore) => {
    let store: TodoStore;

    beforeEach(async () => {
        store = createStore();
        await store.connect();
    });

    afterEach(async () => {
        await store.disconnect();
    });

    it('should assign ascending ids starting at 1', async () => {
        const first = await store.create({ text: 'first', is_completed: false });
        const second = await store.create({ text: 'second', is_completed: true });

        expect(first).toEqual({ id: 1, text: 'first', is_completed: false });
        expect(second).toEqual({ id: 2, text: 'second', is_completed: true });
    });

    it('should list records in ascending id order', async () => {
        await store.create({ text: 'a', is_completed: false });
        await store.create({ text: 'b', is_completed: false });
        await store.create({ text: 'c', is_completed: true });

        expect((await store.listAll()).map((record) => record.text)).toEqual(['a', 'b', 'c']);
    });

    it('should not reuse ids after a delete', async () => {
        await store.create({ text: 'a', is_completed: false });
        const second = await store.create({ text: 'b', is_completed: false });
        await store.deleteById(second.id);

        const third = await store.create({ text: 'c', is_completed: false });

        expect(third.id).toBe(3);
    });

    it('should return undefined for an absent id', async () => {
        await expect(store.getById(42)).resolves.toBeUndefined();
    });

    it('should overwrite an existing record', async () => {
        const created = await store.create({ text: 'draft', is_completed: false });

        await expect(
            store.update({ id: created.id, text: 'final', is_completed: true })
        ).resolves.toBe(true);
        await expect(store.getById(created.id)).resolves.toEqual({
            id: created.id,
            text: 'final',
            is_completed: true,
        });
    });

    it('should report an update of an absent id', async () => {
        await expect(store.update({ id: 7, text: 'x', is_completed: false })).resolves.toBe(
            false
        );
        await expect(store.listAll()).resolves.toEqual([]);
    });

    it('should delete a single record', async () => {
        await store.create({ text: 'a', is_completed: false });
        await store.create({ text: 'b', is_completed: false });

        await expect(store.deleteById(1)).resolves.toBe(true);
        await expect(store.deleteById(1)).resolves.toBe(false);
        expect((await store.listAll()).map((record) => record.id)).toEqual([2]);
    });

    it('should delete every record and report the count', async () => {
        for (const text of ['a', 'b', 'c', 'd']) {
            await store.create({ text, is_completed: false });
        }

        await expect(store.deleteAll()).resolves.toBe(4);
        await expect(store.listAll()).resolves.toEqual([]);
        await expect(store.deleteAll()).resolves.toBe(0);
    });

    it('should hand out copies that callers cannot mutate', async () => {
        const created = await store.create({ text: 'original', is_completed: false });
        created.text = 'mutated';

        await expect(store.getById(created.id)).resolves.toMatchObject({ text: 'original' });
    });

    it('should refuse operations once disconnected', async () => {
        await store.disconnect();

        expect(store.isConnected()).toBe(false);
        await expect(store.listAll()).rejects.toMatchObject({
            code: StorageErrorCode.NOT_CONNECTED,
        });
    });
});
