/**
 * Subagent Types
 *
 * A subagent is a directory holding an AGENT.md file whose body is the
 * subagent's system prompt. Subagents can also be registered in memory.
 */

import type {
  CapabilityResource,
  DiscoveryResult,
  ProgrammaticResourceInput,
  ResourceInfo,
} from '../../base/discovery/index.js';
import type { ResourceError } from '../../base/utils/errors.js';
import type { SubagentExtensions } from './schema.js';

export type { SubagentExtensions };

export type Subagent = CapabilityResource<SubagentExtensions>;

export type SubagentInfo = ResourceInfo<SubagentExtensions>;

export type SubagentDiscoveryResult = DiscoveryResult<SubagentExtensions>;

export type SubagentInput = ProgrammaticResourceInput<SubagentExtensions>;

/**
 * Operations the application layer needs from a subagent manager
 */
export interface SubagentManagerPort {
  discover(): Promise<SubagentDiscoveryResult>;
  loadFullMetadata(name: string): Promise<Subagent>;
  register(subagent: SubagentInput | null | undefined): Promise<void>;
  unregister(name: string): Promise<void>;
  getByName(name: string): Promise<SubagentInfo>;
  listActive(): Promise<SubagentInfo[]>;
  listAll(): Promise<SubagentInfo[]>;
  validateAll(): Promise<Map<string, ResourceError>>;
}
