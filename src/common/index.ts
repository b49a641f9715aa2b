/**
 * Common utilities shared across modules
 */

export { Logger, createLogger, configureLogger, errorMessage, LOG_LEVELS, LOG_FORMATS } from './logger';
export type { LogLevel, LogFormat, LogSettings } from './logger';

export {
    GraphRagError,
    InitializationError,
    ConnectivityError,
    QueryCapabilityError,
    BatchWriteError,
} from './errors';
export type { ErrorCode } from './errors';

export { loadConfig, ConfigSchema } from './config';
export type { Config } from './config';
