import type { Logger, TodoStore, TodoStoreType } from '@tasklane/core';

/**
 * Describes how to build one kind of todo store from its validated config
 */
export interface TodoStoreProvider<TType extends TodoStoreType, TConfig extends { type: TType }> {
    type: TType;
    create(config: TConfig, logger: Logger): TodoStore;
    metadata: {
        displayName: string;
        description: string;
        persistent: boolean;
    };
}
