/**
 * Registry configuration types
 */

/**
 * Name of the directory holding each kind of resource, under every base
 */
export type ResourceDirectory = 'skills' | 'agents';

export const SKILLS_DIR: ResourceDirectory = 'skills';
export const AGENTS_DIR: ResourceDirectory = 'agents';

/**
 * Environment variables read by loadRegistryConfig
 */
export const HOME_ENV = 'CAPREG_HOME';
export const SKILLS_PATH_ENV = 'CAPREG_SKILLS_PATH';
export const AGENTS_PATH_ENV = 'CAPREG_AGENTS_PATH';
export const NO_USER_DIRS_ENV = 'CAPREG_NO_USER_DIRS';

/**
 * Resolved configuration. Every path is absolute.
 */
export interface RegistryConfig {
  /** Project directory; project roots live under it */
  cwd: string;

  /** Home directory; user roots live under `<home>/.claude` */
  home: string;

  /** Whether `<home>/.claude/<dir>` roots are searched */
  includeUserDirs: boolean;

  /** Extra skill roots, lowest priority, in order */
  extraSkillRoots: string[];

  /** Extra subagent roots, lowest priority, in order */
  extraAgentRoots: string[];
}

/**
 * Explicit settings win over the environment
 */
export interface RegistryConfigOptions extends Partial<RegistryConfig> {
  /** Environment to read; defaults to process.env */
  env?: Record<string, string | undefined>;
}
