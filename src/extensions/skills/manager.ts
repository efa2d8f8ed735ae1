/**
 * Skill Manager - discover, load and activate skills
 *
 * Skills are searched in, highest priority first:
 *   ./skills  >  ./.claude/skills  >  ~/.claude/skills  >  CAPREG_SKILLS_PATH
 * A skill name found in a higher-priority root hides every later copy.
 */

import { ResourceRegistry, type SearchRoot } from '../../base/discovery/index.js';
import { loadRegistryConfig, resolveSearchRoots } from '../../base/config/loader.js';
import type { RegistryConfigOptions } from '../../base/config/types.js';
import { createLogger } from '../../base/utils/logger.js';
import type { ResourceError } from '../../base/utils/errors.js';
import { skillKind } from './kind.js';
import type { Skill, SkillDiscoveryResult, SkillExtensions, SkillInfo, SkillManagerPort } from './types.js';

const log = createLogger('Skill', 'skills');

export interface SkillManagerOptions {
  /** Search roots in priority order; resolved from configuration when omitted */
  roots?: SearchRoot[];

  /** Configuration used to resolve roots when `roots` is omitted */
  config?: RegistryConfigOptions;
}

export class SkillManager implements SkillManagerPort {
  private readonly registry: ResourceRegistry<SkillExtensions>;

  constructor(options: SkillManagerOptions = {}) {
    const roots = options.roots ?? resolveSearchRoots('skills', loadRegistryConfig(options.config));
    this.registry = new ResourceRegistry(skillKind, roots);
  }

  get searchRoots(): SearchRoot[] {
    return this.registry.searchRoots;
  }

  /**
   * Rescan every root. Active skills stay active.
   */
  async discover(): Promise<SkillDiscoveryResult> {
    const result = await this.registry.discover();
    log.debug(`Discovered ${result.totalCount} skill(s)`, { active: result.activeCount });
    return result;
  }

  /**
   * Load a skill's instructions. Returns the cached catalog object once loaded.
   */
  loadFullMetadata(name: string): Promise<Skill> {
    return this.registry.loadFull(name);
  }

  async activate(name: string): Promise<boolean> {
    const activated = await this.registry.activate(name);
    log.debug(`Activated skill "${name}"`);
    return activated;
  }

  async deactivate(name: string): Promise<boolean> {
    const deactivated = await this.registry.deactivate(name);
    log.debug(`Deactivated skill "${name}"`);
    return deactivated;
  }

  getByName(name: string): Promise<SkillInfo> {
    return this.registry.getByName(name);
  }

  listActive(): Promise<SkillInfo[]> {
    return this.registry.listActive();
  }

  listAll(): Promise<SkillInfo[]> {
    return this.registry.listAll();
  }

  validateAll(): Promise<Map<string, ResourceError>> {
    return this.registry.validateAll();
  }

  /**
   * The live catalog object, with its instructions if they were loaded
   */
  getSkill(name: string): Skill | undefined {
    return this.registry.getResource(name);
  }
}
