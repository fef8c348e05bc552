export enum ConfigErrorCode {
    INVALID_CONFIG = 'config_invalid',
    ENV_FILE_READ_ERROR = 'config_env_file_read_error',
}
