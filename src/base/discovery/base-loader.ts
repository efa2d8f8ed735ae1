/**
 * Priority Resolver - discover resources across ordered search roots
 *
 * Roots are scanned highest priority first with one shared set of seen
 * names, so the first root that yields a name owns it and every later copy
 * is discarded.
 */

import type { CapabilityResource, DiscoveryResult, ResourceKind, SearchRoot } from './types.js';
import { scanRoot, type ScanContext } from './file-scanner.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Discovery', 'discovery');

/**
 * Scan `roots` in order into `catalog`
 *
 * @param catalog Catalog to fill; entries already present (carried-over
 *   active resources) are refreshed in place when found again
 * @param isActive Activation lookup used for the result snapshots
 */
export async function discoverFromRoots<E extends object>(
  roots: readonly SearchRoot[],
  kind: ResourceKind<E>,
  catalog: Map<string, CapabilityResource<E>>,
  isActive: (name: string) => boolean
): Promise<DiscoveryResult<E>> {
  const context: ScanContext<E> = {
    kind,
    seenNames: new Set(),
    catalog,
    isActive,
  };

  const result: DiscoveryResult<E> = {
    resources: [],
    rootsSearched: [],
    totalCount: 0,
    activeCount: 0,
  };

  for (const root of roots) {
    result.rootsSearched.push(root.path);
    result.resources.push(...(await scanRoot(root, context)));
  }

  result.totalCount = result.resources.length;
  result.activeCount = result.resources.filter((resource) => resource.isActive).length;

  log.debug(`Discovered ${result.totalCount} ${kind.label.toLowerCase()}(s)`, {
    roots: result.rootsSearched,
    active: result.activeCount,
  });

  return result;
}
