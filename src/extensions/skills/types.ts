/**
 * Skills System Types
 *
 * A skill is a directory holding a SKILL.md file: YAML frontmatter with the
 * skill's metadata, then the instructions loaded when the skill is used.
 */

import type { z } from 'zod';
import type {
  CapabilityResource,
  DiscoveryResult,
  ProgrammaticResourceInput,
  ResourceInfo,
} from '../../base/discovery/index.js';
import type { ResourceError } from '../../base/utils/errors.js';
import type { SkillExtensionSchema } from './schema.js';

/**
 * Skill-specific frontmatter fields
 */
export type SkillExtensions = z.infer<typeof SkillExtensionSchema>;

/**
 * Complete skill, including its instructions once loaded
 */
export type Skill = CapabilityResource<SkillExtensions>;

/**
 * Snapshot of a skill for listings
 */
export type SkillInfo = ResourceInfo<SkillExtensions>;

export type SkillDiscoveryResult = DiscoveryResult<SkillExtensions>;

export type SkillInput = ProgrammaticResourceInput<SkillExtensions>;

/**
 * Operations the application layer needs from a skill manager
 */
export interface SkillManagerPort {
  discover(): Promise<SkillDiscoveryResult>;
  loadFullMetadata(name: string): Promise<Skill>;
  activate(name: string): Promise<boolean>;
  deactivate(name: string): Promise<boolean>;
  getByName(name: string): Promise<SkillInfo>;
  listActive(): Promise<SkillInfo[]>;
  listAll(): Promise<SkillInfo[]>;
  validateAll(): Promise<Map<string, ResourceError>>;
}
