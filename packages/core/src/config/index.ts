export { loadEnvironment, loadAppConfig, loadTokenConfig } from './loader.js';
export {
    AppConfigSchema,
    ServerConfigSchema,
    type AppConfig,
    type ValidatedAppConfig,
    type ValidatedServerConfig,
} from './schemas.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
