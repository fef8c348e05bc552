export enum TodoErrorCode {
    TODO_VALIDATION_FAILED = 'todo_validation_failed',
    TODO_INVALID_ID = 'todo_invalid_id',
    TODO_NOT_FOUND = 'todo_not_found',
}
