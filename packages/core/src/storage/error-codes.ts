/**
 * Record store error codes
 */
export enum StorageErrorCode {
    // Connection
    CONNECTION_FAILED = 'storage_connection_failed',
    NOT_CONNECTED = 'storage_not_connected',

    // Operations
    READ_FAILED = 'storage_read_failed',
    WRITE_FAILED = 'storage_write_failed',
    DELETE_FAILED = 'storage_delete_failed',

    // Setup
    MIGRATION_FAILED = 'storage_migration_failed',
    INVALID_CONFIG = 'storage_invalid_config',
}
