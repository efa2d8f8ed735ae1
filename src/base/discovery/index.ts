/**
 * Discovery engine - shared by skills and subagents
 */

export type {
  ResourceSourceType,
  FileSourceType,
  SearchRoot,
  CapabilityResource,
  ResourceFields,
  ResourceInfo,
  DiscoveryResult,
  ResourceKind,
} from './types.js';

export {
  AllowedToolsSchema,
  CoreFrontmatterSchema,
  splitFrontmatter,
  decodeMetadataOnly,
  decodeFull,
  type SplitDocument,
  type DecodedResource,
} from './frontmatter.js';

export { validateResource, validateDirectoryName, toResourceInfo } from './resource.js';
export { compareWalkOrder, findDefinitionFiles, scanRoot, type ScanContext } from './file-scanner.js';
export { discoverFromRoots } from './base-loader.js';
export { locateDefinitionFile, loadResourceFile } from './progressive-loader.js';
export { ResourceRegistry, type ProgrammaticResourceInput } from './registry.js';
export { ReloadHandler, type ReloadCallback } from './reload-handler.js';
