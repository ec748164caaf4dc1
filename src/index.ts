// Persistence service
export { BlogDatabase } from './database/service.js';
export type {
  BlogDatabaseOptions,
  User,
  Post,
  Tag,
  Comment,
  PostTag,
  UserUpdate,
  PostUpdate,
  TagUpdate,
  CommentUpdate,
} from './database/types.js';
export { users, posts, tags, comments, postTags } from './database/schema.js';
export { ensureSchema, listTables } from './database/bootstrap.js';
export { TABLE_DDL, TABLE_NAMES } from './database/ddl.js';
export type { TableName } from './database/ddl.js';
export {
  hashPassword,
  verifyPassword,
  fitsPasswordLimit,
  MAX_PASSWORD_BYTES,
  DEFAULT_PASSWORD_ROUNDS,
  MIN_PASSWORD_ROUNDS,
  MAX_PASSWORD_ROUNDS,
} from './database/credentials.js';
export { translateStoreError, withStoreErrors } from './database/errors.js';

// Core exports
export {
  ApiException,
  InputValidationException,
  NotFoundException,
  UnauthorizedException,
  ConstraintViolationException,
  StoreUnavailableException,
  ConfigurationException,
} from './core/exceptions.js';
export type { ApiStatusCode, ConstraintKind } from './core/exceptions.js';
export {
  createErrorHandler,
  zodErrorMapper,
  storeErrorMapper,
} from './core/error-handler.js';
export type {
  ErrorMapper,
  ErrorHook,
  ErrorHandlerConfig,
} from './core/error-handler.js';
export {
  createConsoleLogger,
  withScope,
  isLevelEnabled,
  setLogger,
  getLogger,
  LOG_LEVELS,
} from './core/logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './core/logger.js';
export { getContextVar, setContextVar, getRequestId } from './core/context-helpers.js';

// Configuration
export {
  ConfigSchema,
  parseConfig,
  loadConfig,
  resolveConfigPath,
  DEFAULT_CONFIG_PATH,
  CONFIG_PATH_ENV,
} from './config/index.js';
export type { Config, ConfigInput } from './config/index.js';

// Logging middleware
export {
  createRequestLogger,
  defaultLevelResolver,
  shouldExcludePath,
} from './logging/middleware.js';
export type { RequestLoggerConfig, RequestLogLevel } from './logging/middleware.js';

// Web app
export { createApp, APP_NAME } from './app/index.js';
export type { AppOptions } from './app/index.js';
export type { AppEnv } from './app/types.js';
export { createHealthEndpoints } from './app/health.js';
export type { HealthCheck, HealthCheckResult, HealthConfig, HealthResponse } from './app/health.js';
export { RegisterSchema, LoginSchema, IdParamSchema } from './app/schemas.js';
export type { RegisterInput, LoginInput } from './app/schemas.js';
