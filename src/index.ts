/**
 * posts-api - A JSON resource server for posts
 *
 * Create, list, read and delete posts over HTTP, with content
 * negotiation, payload validation and substring filtering.
 *
 * @packageDocumentation
 */

// Post schema and validation
export * from './schema';

// Errors
export {
  ApiError,
  NotAcceptableError,
  UnsupportedMediaTypeError,
  ValidationError,
  NotFoundError,
  MethodNotAllowedError,
  isApiError,
} from './errors';

// Query filters
export {
  parsePostFilter,
  matchesPostFilter,
  applyPostFilter,
  toLikePattern,
  filterConditions,
  FILTER_PARAMS,
} from './query/filter';
export type { PostFilter } from './query/filter';

// Storage drivers
export * from './storage';

// Middleware
export * from './middleware';

// Resource operations
export { listPosts, getPost, createPost, deletePost, parsePostId } from './resources/posts';
export type { PostLocation } from './resources/posts';

// Handlers, server and seeding
export * from './runtime';

// Configuration
export {
  loadConfig,
  configFromEnv,
  ServerConfigSchema,
  DEFAULT_CONFIG,
  CONFIG_ENV_VARS,
  CONFIG_LOG_LEVELS,
} from './config';
export type { ServerConfig, ConfigOverrides } from './config';

// OpenAPI generation
export * from './generator';
