/**
 * capability-registry - discover, load and activate skills and subagents
 */

export * from './base/discovery/index.js';
export * from './base/config/index.js';
export * from './extensions/skills/index.js';
export * from './extensions/subagents/index.js';

export {
  ResourceError,
  InvalidNameError,
  FrontmatterError,
  MissingFieldError,
  InvalidResourceError,
  ResourceNotFoundError,
  ResourceFileNotFoundError,
  AlreadyRegisteredError,
  ConfigError,
  isResourceError,
  type ResourceErrorCode,
  type InvalidNameCode,
  type ConfigIssue,
} from './base/utils/errors.js';
export { validateResourceName, isValidResourceName, MAX_RESOURCE_NAME_LENGTH } from './base/utils/validation.js';
export { ReadWriteLock } from './base/utils/rw-lock.js';
export { createLogger, setLogSink, LogLevel, type LogSink, type ComponentLogger } from './base/utils/logger.js';
export { resetDebugConfig, type DebugComponent } from './base/utils/debug.js';
