/**
 * Configuration Module - search roots for skills and subagents
 */

export type { RegistryConfig, RegistryConfigOptions, ResourceDirectory } from './types.js';

export {
  SKILLS_DIR,
  AGENTS_DIR,
  HOME_ENV,
  SKILLS_PATH_ENV,
  AGENTS_PATH_ENV,
  NO_USER_DIRS_ENV,
} from './types.js';

export { loadRegistryConfig, parseRootList, resolveSearchRoots } from './loader.js';
