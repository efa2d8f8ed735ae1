/**
 * Progressive Loader - read a resource's body on demand
 *
 * Discovery keeps metadata only. When a resource is actually used, its
 * definition file is read again and fully decoded. Callers must have validated `name`
 * before it reaches this module: it is joined into a path here.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { CapabilityResource, FileSourceType, ResourceKind, SearchRoot } from './types.js';
import { decodeFull } from './frontmatter.js';
import { validateDirectoryName, validateResource } from './resource.js';
import { ResourceError, ResourceFileNotFoundError, errorMessage } from '../utils/errors.js';
import { isFile, isNotFoundError } from '../utils/path-utils.js';

interface LocatedFile {
  filePath: string;
  sourceType: FileSourceType;
}

/**
 * Find the definition file for `name`: the catalog entry's recorded directory when
 * there is one, otherwise the first root (in priority order) holding
 * `<root>/<name>/<fileName>`.
 */
export async function locateDefinitionFile<E extends object>(
  name: string,
  entry: CapabilityResource<E> | undefined,
  roots: readonly SearchRoot[],
  kind: ResourceKind<E>
): Promise<LocatedFile | null> {
  if (entry && entry.originalPath !== '' && entry.sourceType !== 'programmatic') {
    return {
      filePath: path.join(entry.originalPath, kind.fileName),
      sourceType: entry.sourceType,
    };
  }

  for (const root of roots) {
    const candidate = path.join(root.path, name, kind.fileName);
    if (await isFile(candidate)) {
      return { filePath: candidate, sourceType: root.sourceType };
    }
  }

  return null;
}

/**
 * Read and fully decode the definition file for `name`
 *
 * @param entry Current catalog entry, if any. A file found without one is
 *   validated like a discovered file, since nothing has vetted it yet.
 * @throws ResourceFileNotFoundError when no definition file exists
 */
export async function loadResourceFile<E extends object>(
  name: string,
  entry: CapabilityResource<E> | undefined,
  roots: readonly SearchRoot[],
  kind: ResourceKind<E>
): Promise<CapabilityResource<E>> {
  const located = await locateDefinitionFile(name, entry, roots, kind);
  if (!located) {
    throw new ResourceFileNotFoundError(kind.fileName, name);
  }

  let content: string;
  try {
    content = await fs.readFile(located.filePath, 'utf-8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ResourceFileNotFoundError(kind.fileName, name);
    }
    throw new ResourceError('READ_FAILED', `failed to read ${kind.fileName}: ${errorMessage(error)}`, {
      resourceName: name,
      cause: error,
    });
  }

  const decoded = decodeFull(content, kind);
  const originalPath = path.dirname(located.filePath);

  if (!entry) {
    validateResource(decoded, kind);
    validateDirectoryName(decoded.name, path.basename(originalPath));
  }

  return {
    ...decoded,
    sourceType: located.sourceType,
    directoryPath: path.resolve(originalPath),
    originalPath,
  };
}
