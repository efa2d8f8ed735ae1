/**
 * Entity-level helpers shared by the scanner and the registry
 */

import type { CapabilityResource, ResourceFields, ResourceInfo, ResourceKind } from './types.js';
import { InvalidResourceError, MissingFieldError } from '../utils/errors.js';
import { validateResourceName } from '../utils/validation.js';

/**
 * Validate a resource: name grammar, required description, then the kind's
 * own rules. Throws the first ResourceError found.
 */
export function validateResource<E extends object>(resource: ResourceFields<E>, kind: ResourceKind<E>): void {
  validateResourceName(resource.name);
  if (resource.description === '') {
    throw new MissingFieldError('description', resource.name);
  }
  kind.validate?.(resource);
}

/**
 * A definition file's directory must be named after the resource it defines
 */
export function validateDirectoryName(name: string, directoryName: string): void {
  if (name !== directoryName) {
    throw new InvalidResourceError(
      `directory name "${directoryName}" does not match resource name "${name}"`,
      name
    );
  }
}

/**
 * Build a detached snapshot of a catalog entry
 */
export function toResourceInfo<E extends object>(
  resource: CapabilityResource<E>,
  kind: ResourceKind<E>,
  isActive: boolean
): ResourceInfo<E> {
  return {
    name: resource.name,
    description: resource.description,
    allowedTools: [...resource.allowedTools],
    extensions: kind.cloneExtensions(resource.extensions),
    sourceType: resource.sourceType,
    directoryPath: resource.originalPath,
    isActive,
  };
}

/**
 * Refresh a catalog entry from a newer decode without replacing the object.
 * Every field is taken from `source`, body included.
 */
export function refreshResource<E extends object>(
  target: CapabilityResource<E>,
  source: CapabilityResource<E>
): void {
  target.description = source.description;
  target.allowedTools = source.allowedTools;
  target.extensions = source.extensions;
  target.sourceType = source.sourceType;
  target.directoryPath = source.directoryPath;
  target.originalPath = source.originalPath;
  target.rawFrontmatter = source.rawFrontmatter;
  target.body = source.body;
}
