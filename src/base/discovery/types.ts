/**
 * Capability Resource Discovery - Core Types
 *
 * Skills and subagents share one discovery engine. A resource is a directory
 * holding a definition file (SKILL.md / AGENT.md) with YAML frontmatter and a
 * free-text body. Roots are searched in priority order and the first root to
 * yield a name wins.
 */

import type { z } from 'zod';

/**
 * Which root produced a resource. `programmatic` resources are registered
 * in memory and never come from disk.
 */
export type ResourceSourceType = 'project' | 'project-claude' | 'user' | 'programmatic';

export type FileSourceType = Exclude<ResourceSourceType, 'programmatic'>;

/**
 * A directory searched for resources
 */
export interface SearchRoot {
  /** Directory path, absolute or relative to the process cwd */
  path: string;

  /** Source type stamped on everything found under this root */
  sourceType: FileSourceType;
}

/**
 * A skill or subagent. `E` holds the kind-specific frontmatter fields.
 */
export interface CapabilityResource<E extends object> {
  /** Unique key within a registry */
  name: string;

  description: string;

  /** Tool allowlist, empty when the frontmatter declares none */
  allowedTools: string[];

  /** Kind-specific fields, passed through unchanged */
  extensions: E;

  sourceType: ResourceSourceType;

  /** Absolute path to the resource directory; empty for programmatic resources */
  directoryPath: string;

  /** Directory path as found under the configured root */
  originalPath: string;

  /** Verbatim YAML frontmatter */
  rawFrontmatter: string;

  /** Body text; '' until loaded */
  body: string;
}

/**
 * The fields every kind validates, independent of where the resource lives
 */
export type ResourceFields<E extends object> = Pick<
  CapabilityResource<E>,
  'name' | 'description' | 'allowedTools' | 'extensions'
>;

/**
 * Snapshot of a resource handed to consumers. Never aliases registry state.
 */
export interface ResourceInfo<E extends object> {
  name: string;
  description: string;
  allowedTools: string[];
  extensions: E;
  sourceType: ResourceSourceType;
  directoryPath: string;
  isActive: boolean;
}

/**
 * Result of one discovery pass
 */
export interface DiscoveryResult<E extends object> {
  /** Resources found in this pass, in priority-then-walk order */
  resources: ResourceInfo<E>[];

  /** Every root searched, in order, including ones that do not exist */
  rootsSearched: string[];

  totalCount: number;

  /** How many of `resources` are active */
  activeCount: number;
}

/**
 * Describes one kind of capability resource to the generic engine
 */
export interface ResourceKind<E extends object> {
  /** Label used in logs and error messages (e.g. "Skill") */
  label: string;

  /** Spec file name inside each resource directory (e.g. "SKILL.md") */
  fileName: string;

  /** Decodes the kind-specific fields from parsed frontmatter */
  extensionSchema: z.ZodType<E, z.ZodTypeDef, unknown>;

  /**
   * Kind-specific validation run after the shared name/description checks.
   * Throws a ResourceError on failure.
   */
  validate?(resource: ResourceFields<E>): void;

  /** Copies extension fields for a snapshot */
  cloneExtensions(extensions: E): E;
}
