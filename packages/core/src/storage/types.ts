/**
 * A todo as persisted by a record store.
 * Column names follow the storage layout; see `toTodo` for the wire projection.
 */
export interface TodoRecord {
    id: number;
    text: string;
    is_completed: boolean;
}

/** Fields a store needs to insert a record; the id is assigned by the store */
export type NewTodoRecord = Omit<TodoRecord, 'id'>;

/**
 * Persistence contract for todo records.
 *
 * Implementations assign ids in ascending order starting at 1 and never reuse them.
 * Every operation either completes or throws a StorageError.
 */
export interface TodoStore {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
    getStoreType(): string;

    /** All records ordered by ascending id */
    listAll(): Promise<TodoRecord[]>;
    /** undefined when no record has this id */
    getById(id: number): Promise<TodoRecord | undefined>;
    create(record: NewTodoRecord): Promise<TodoRecord>;
    /** Overwrites text and is_completed of an existing record; false when the id is absent */
    update(record: TodoRecord): Promise<boolean>;
    /** false when the id is absent */
    deleteById(id: number): Promise<boolean>;
    /** Returns the number of records removed */
    deleteAll(): Promise<number>;
}
