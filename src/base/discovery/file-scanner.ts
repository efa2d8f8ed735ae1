/**
 * Directory Scanner - find and decode definition files under one search root
 *
 * Walks the whole tree below the root for files named after the kind's
 * file (SKILL.md, AGENT.md). Each file is decoded metadata-only, unless the
 * catalog already holds a loaded body for that name. A file that fails to
 * decode or validate is skipped and the scan goes on.
 */

import fastGlob from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { CapabilityResource, ResourceInfo, ResourceKind, SearchRoot } from './types.js';
import { decodeFull, decodeMetadataOnly } from './frontmatter.js';
import { refreshResource, toResourceInfo, validateDirectoryName, validateResource } from './resource.js';
import { createLogger } from '../utils/logger.js';
import { isVerboseDebugEnabled } from '../utils/debug.js';
import { isDirectory } from '../utils/path-utils.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('Discovery', 'discovery');

/**
 * Shared state for one discovery pass across all roots
 */
export interface ScanContext<E extends object> {
  kind: ResourceKind<E>;

  /** Names already claimed by a higher-priority root */
  seenNames: Set<string>;

  /** Catalog being built, written as resources are accepted */
  catalog: Map<string, CapabilityResource<E>>;

  isActive(name: string): boolean;
}

/**
 * Order relative paths the way a directory walk visits them:
 * segment by segment, each segment compared lexically.
 */
export function compareWalkOrder(a: string, b: string): number {
  const left = a.split('/');
  const right = b.split('/');
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

/**
 * List every definition file below a root, in walk order
 *
 * @returns Paths joined onto `root` as given (relative roots stay relative)
 */
export async function findDefinitionFiles(root: string, fileName: string): Promise<string[]> {
  const matches = await fastGlob(`**/${fastGlob.escapePath(fileName)}`, {
    cwd: root,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  return matches.sort(compareWalkOrder).map((relative) => path.join(root, relative));
}

async function readCandidate<E extends object>(
  filePath: string,
  root: SearchRoot,
  context: ScanContext<E>
): Promise<CapabilityResource<E> | null> {
  const { kind } = context;
  const originalPath = path.dirname(filePath);

  let resource: CapabilityResource<E>;
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    // An entry whose body is already loaded gets the new body with the new metadata
    const loaded = context.catalog.get(path.basename(originalPath))?.body;
    const decoded = loaded ? decodeFull(content, kind) : decodeMetadataOnly(content, kind);
    validateResource(decoded, kind);
    validateDirectoryName(decoded.name, path.basename(originalPath));

    resource = {
      ...decoded,
      sourceType: root.sourceType,
      directoryPath: path.resolve(originalPath),
      originalPath,
    };
  } catch (error) {
    log.debug(`Skipped ${kind.fileName}`, {
      file: filePath,
      source: root.sourceType,
      reason: errorMessage(error),
    });
    return null;
  }

  if (context.seenNames.has(resource.name)) {
    log.debug(`${kind.label} "${resource.name}" shadowed by a higher-priority root`, {
      file: filePath,
      source: root.sourceType,
    });
    return null;
  }
  context.seenNames.add(resource.name);

  const existing = context.catalog.get(resource.name);
  if (existing) {
    refreshResource(existing, resource);
    return existing;
  }

  context.catalog.set(resource.name, resource);
  if (isVerboseDebugEnabled('discovery')) {
    log.debug(`Accepted ${kind.label.toLowerCase()} "${resource.name}"`, {
      file: filePath,
      source: root.sourceType,
    });
  }
  return resource;
}

/**
 * Scan one root and record what it contributes
 *
 * A root that does not exist, or is not a directory, contributes nothing.
 */
export async function scanRoot<E extends object>(
  root: SearchRoot,
  context: ScanContext<E>
): Promise<ResourceInfo<E>[]> {
  if (!(await isDirectory(root.path))) {
    return [];
  }

  const found: ResourceInfo<E>[] = [];
  for (const filePath of await findDefinitionFiles(root.path, context.kind.fileName)) {
    const resource = await readCandidate(filePath, root, context);
    if (resource) {
      found.push(toResourceInfo(resource, context.kind, context.isActive(resource.name)));
    }
  }

  return found;
}
