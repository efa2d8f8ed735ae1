/**
 * Subagent Manager - discover AGENT.md files and register subagents in code
 *
 * Subagents are searched in, highest priority first:
 *   ./agents  >  ./.claude/agents  >  ~/.claude/agents  >  CAPREG_AGENTS_PATH
 * Registered subagents shadow discovered ones of the same name.
 */

import { ResourceRegistry, type SearchRoot } from '../../base/discovery/index.js';
import { loadRegistryConfig, resolveSearchRoots } from '../../base/config/loader.js';
import type { RegistryConfigOptions } from '../../base/config/types.js';
import { createLogger } from '../../base/utils/logger.js';
import type { ResourceError } from '../../base/utils/errors.js';
import { subagentKind } from './kind.js';
import type { SubagentExtensions } from './schema.js';
import type {
  Subagent,
  SubagentDiscoveryResult,
  SubagentInfo,
  SubagentInput,
  SubagentManagerPort,
} from './types.js';

const log = createLogger('Subagent', 'subagents');

export interface SubagentManagerOptions {
  /** Search roots in priority order; resolved from configuration when omitted */
  roots?: SearchRoot[];

  /** Configuration used to resolve roots when `roots` is omitted */
  config?: RegistryConfigOptions;
}

export class SubagentManager implements SubagentManagerPort {
  private readonly registry: ResourceRegistry<SubagentExtensions>;

  constructor(options: SubagentManagerOptions = {}) {
    const roots = options.roots ?? resolveSearchRoots('agents', loadRegistryConfig(options.config));
    this.registry = new ResourceRegistry(subagentKind, roots);
  }

  get searchRoots(): SearchRoot[] {
    return this.registry.searchRoots;
  }

  async discover(): Promise<SubagentDiscoveryResult> {
    const result = await this.registry.discover();
    log.debug(`Discovered ${result.totalCount} subagent(s)`, { active: result.activeCount });
    return result;
  }

  /**
   * Load a subagent's system prompt
   */
  loadFullMetadata(name: string): Promise<Subagent> {
    return this.registry.loadFull(name);
  }

  async register(subagent: SubagentInput | null | undefined): Promise<void> {
    await this.registry.register(subagent);
    log.debug(`Registered subagent "${subagent?.name ?? ''}"`);
  }

  async unregister(name: string): Promise<void> {
    await this.registry.unregister(name);
    log.debug(`Unregistered subagent "${name}"`);
  }

  /**
   * Make a discovered subagent available. Registered subagents always are.
   */
  activate(name: string): Promise<boolean> {
    return this.registry.activate(name);
  }

  deactivate(name: string): Promise<boolean> {
    return this.registry.deactivate(name);
  }

  getByName(name: string): Promise<SubagentInfo> {
    return this.registry.getByName(name);
  }

  listActive(): Promise<SubagentInfo[]> {
    return this.registry.listActive();
  }

  listAll(): Promise<SubagentInfo[]> {
    return this.registry.listAll();
  }

  validateAll(): Promise<Map<string, ResourceError>> {
    return this.registry.validateAll();
  }

  getSubagent(name: string): Subagent | undefined {
    return this.registry.getResource(name);
  }
}
