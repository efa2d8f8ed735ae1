/**
 * Configuration Loader - resolve search roots from options and environment
 *
 * Precedence for every setting: explicit option > CAPREG_* variable > default.
 * Roots are searched in this order, highest priority first:
 *   <cwd>/<dir>  >  <cwd>/.claude/<dir>  >  <home>/.claude/<dir>  >  extra roots
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { SearchRoot } from '../discovery/types.js';
import { ConfigError, type ConfigIssue } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { CLAUDE_DIR, expandHome } from '../utils/path-utils.js';
import {
  AGENTS_PATH_ENV,
  HOME_ENV,
  NO_USER_DIRS_ENV,
  SKILLS_PATH_ENV,
  type RegistryConfig,
  type RegistryConfigOptions,
  type ResourceDirectory,
} from './types.js';

const log = createLogger('Config', 'config');

const EnvSchema = z.object({
  [HOME_ENV]: z.string().optional(),
  [SKILLS_PATH_ENV]: z.string().optional(),
  [AGENTS_PATH_ENV]: z.string().optional(),
  [NO_USER_DIRS_ENV]: z
    .enum(['0', '1', 'true', 'false'], {
      errorMap: () => ({ message: 'expected one of 0, 1, true, false' }),
    })
    .optional(),
});

const RegistryConfigSchema = z.object({
  cwd: z.string().min(1, 'working directory cannot be empty'),
  home: z.string().min(1, 'home directory cannot be empty'),
  includeUserDirs: z.boolean(),
  extraSkillRoots: z.array(z.string().min(1, 'root path cannot be empty')),
  extraAgentRoots: z.array(z.string().min(1, 'root path cannot be empty')),
});

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Split a colon-separated list of directories, expanding `~`
 */
export function parseRootList(value: string | undefined, home: string): string[] {
  if (!value) return [];

  return value
    .split(':')
    .map((dir) => dir.trim())
    .filter((dir) => dir.length > 0)
    .map((dir) => expandHome(dir, home));
}

/**
 * Build a validated RegistryConfig
 *
 * @throws ConfigError listing every invalid setting
 */
export function loadRegistryConfig(options: RegistryConfigOptions = {}): RegistryConfig {
  // Variables set to '' count as unset
  const rawEnv = options.env ?? process.env;
  const envInput = Object.fromEntries(
    Object.entries(rawEnv).filter(([, value]) => value !== undefined && value !== '')
  );

  const env = EnvSchema.safeParse(envInput);
  if (!env.success) {
    throw new ConfigError('invalid environment configuration', toIssues(env.error));
  }

  const home = options.home ?? env.data[HOME_ENV] ?? os.homedir();
  const noUserDirs = env.data[NO_USER_DIRS_ENV];

  const parsed = RegistryConfigSchema.safeParse({
    cwd: options.cwd ?? process.cwd(),
    home,
    includeUserDirs: options.includeUserDirs ?? !(noUserDirs === '1' || noUserDirs === 'true'),
    extraSkillRoots: options.extraSkillRoots ?? parseRootList(env.data[SKILLS_PATH_ENV], home),
    extraAgentRoots: options.extraAgentRoots ?? parseRootList(env.data[AGENTS_PATH_ENV], home),
  });
  if (!parsed.success) {
    throw new ConfigError('invalid registry configuration', toIssues(parsed.error));
  }

  const config = parsed.data;
  return {
    cwd: path.resolve(config.cwd),
    home: path.resolve(config.home),
    includeUserDirs: config.includeUserDirs,
    extraSkillRoots: config.extraSkillRoots.map((root) => path.resolve(config.cwd, root)),
    extraAgentRoots: config.extraAgentRoots.map((root) => path.resolve(config.cwd, root)),
  };
}

/**
 * Ordered search roots for one kind of resource, highest priority first
 */
export function resolveSearchRoots(directory: ResourceDirectory, config: RegistryConfig): SearchRoot[] {
  const roots: SearchRoot[] = [
    { path: path.join(config.cwd, directory), sourceType: 'project' },
    { path: path.join(config.cwd, CLAUDE_DIR, directory), sourceType: 'project-claude' },
  ];

  if (config.includeUserDirs) {
    roots.push({ path: path.join(config.home, CLAUDE_DIR, directory), sourceType: 'user' });
  }

  const extras = directory === 'skills' ? config.extraSkillRoots : config.extraAgentRoots;
  for (const extra of extras) {
    roots.push({ path: extra, sourceType: 'user' });
  }

  log.debug(`Resolved ${directory} roots`, { roots: roots.map((root) => root.path) });
  return roots;
}
