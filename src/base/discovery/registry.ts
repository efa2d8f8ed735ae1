/**
 * Resource Registry - the mutable catalog behind skills and subagents
 *
 * Holds three maps, all guarded by one read/write lock per instance:
 * - catalog: resources discovered on disk, by name
 * - active: names of catalog entries switched on for consumers
 * - programmatic: resources registered in memory, by name
 *
 * Activation is kept beside the catalog, not on the entities. Active entries
 * are carried over across rediscovery even when their file is gone.
 */

import type {
  CapabilityResource,
  DiscoveryResult,
  ResourceFields,
  ResourceInfo,
  ResourceKind,
  SearchRoot,
} from './types.js';
import { discoverFromRoots } from './base-loader.js';
import { loadResourceFile } from './progressive-loader.js';
import { toResourceInfo, validateResource } from './resource.js';
import {
  AlreadyRegisteredError,
  InvalidResourceError,
  ResourceNotFoundError,
  isResourceError,
  type ResourceError,
} from '../utils/errors.js';
import { ReadWriteLock } from '../utils/rw-lock.js';
import { validateResourceName } from '../utils/validation.js';

/**
 * What a caller supplies to register a resource in memory
 */
export type ProgrammaticResourceInput<E extends object> = ResourceFields<E> & {
  body?: string;
  rawFrontmatter?: string;
};

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export class ResourceRegistry<E extends object> {
  private readonly lock = new ReadWriteLock();
  private catalog = new Map<string, CapabilityResource<E>>();
  private readonly active = new Set<string>();
  private readonly programmatic = new Map<string, CapabilityResource<E>>();
  private readonly roots: readonly SearchRoot[];

  constructor(
    readonly kind: ResourceKind<E>,
    roots: readonly SearchRoot[]
  ) {
    this.roots = roots.map((root) => ({ ...root }));
  }

  /**
   * Search roots in priority order (highest first)
   */
  get searchRoots(): SearchRoot[] {
    return this.roots.map((root) => ({ ...root }));
  }

  /**
   * Rebuild the catalog from disk, carrying over active entries
   *
   * The new catalog replaces the old one only once the scan has finished.
   */
  discover(): Promise<DiscoveryResult<E>> {
    return this.lock.withWrite(async () => {
      const next = new Map<string, CapabilityResource<E>>();
      for (const [name, resource] of this.catalog) {
        if (this.active.has(name)) {
          next.set(name, resource);
        }
      }

      const result = await discoverFromRoots(this.roots, this.kind, next, (name) => this.active.has(name));
      this.catalog = next;
      return result;
    });
  }

  /**
   * Return the resource with its body loaded
   *
   * The catalog entry is filled in place and returned, so references taken
   * earlier see the body too. A file found without a catalog entry is
   * returned without being added to the catalog.
   */
  async loadFull(name: string): Promise<CapabilityResource<E>> {
    validateResourceName(name);

    return this.lock.withWrite(async () => {
      const registered = this.programmatic.get(name);
      if (registered) {
        return registered;
      }

      const entry = this.catalog.get(name);
      if (entry && entry.body !== '') {
        return entry;
      }

      const loaded = await loadResourceFile(name, entry, this.roots, this.kind);
      if (!entry) {
        return loaded;
      }

      entry.body = loaded.body;
      entry.rawFrontmatter = loaded.rawFrontmatter;
      return entry;
    });
  }

  /**
   * Mark a discovered resource active. Programmatic resources are always active.
   */
  async activate(name: string): Promise<boolean> {
    validateResourceName(name);

    return this.lock.withWrite(() => {
      if (this.programmatic.has(name)) {
        return true;
      }
      if (!this.catalog.has(name)) {
        throw new ResourceNotFoundError(this.kind.label, name);
      }
      this.active.add(name);
      return true;
    });
  }

  /**
   * Mark a discovered resource inactive. Returns true for any known name,
   * whether or not it was active. Programmatic resources stay active until
   * unregistered.
   */
  async deactivate(name: string): Promise<boolean> {
    validateResourceName(name);

    return this.lock.withWrite(() => {
      if (!this.catalog.has(name) && !this.programmatic.has(name)) {
        throw new ResourceNotFoundError(this.kind.label, name);
      }
      this.active.delete(name);
      return true;
    });
  }

  /**
   * Register a resource in memory
   */
  async register(input: ProgrammaticResourceInput<E> | null | undefined): Promise<void> {
    if (!input) {
      throw new InvalidResourceError(`invalid ${this.kind.label.toLowerCase()}: resource is required`);
    }
    validateResource(input, this.kind);

    const resource: CapabilityResource<E> = {
      name: input.name,
      description: input.description,
      allowedTools: [...input.allowedTools],
      extensions: this.kind.cloneExtensions(input.extensions),
      sourceType: 'programmatic',
      directoryPath: '',
      originalPath: '',
      rawFrontmatter: input.rawFrontmatter ?? '',
      body: input.body ?? '',
    };

    await this.lock.withWrite(() => {
      if (this.programmatic.has(resource.name)) {
        throw new AlreadyRegisteredError(this.kind.label, resource.name);
      }
      this.programmatic.set(resource.name, resource);
    });
  }

  /**
   * Remove a programmatically registered resource
   */
  async unregister(name: string): Promise<void> {
    validateResourceName(name);

    await this.lock.withWrite(() => {
      if (!this.programmatic.delete(name)) {
        throw new ResourceNotFoundError(this.kind.label, name);
      }
    });
  }

  /**
   * Look a resource up, programmatic registrations first
   */
  async getByName(name: string): Promise<ResourceInfo<E>> {
    validateResourceName(name);

    return this.lock.withRead(() => {
      const registered = this.programmatic.get(name);
      if (registered) {
        return toResourceInfo(registered, this.kind, true);
      }

      const resource = this.catalog.get(name);
      if (!resource) {
        throw new ResourceNotFoundError(this.kind.label, name);
      }
      return toResourceInfo(resource, this.kind, this.active.has(name));
    });
  }

  /**
   * Programmatic resources plus active discovered ones
   */
  listActive(): Promise<ResourceInfo<E>[]> {
    return this.lock.withRead(() => this.snapshot(true));
  }

  /**
   * Every resource, active or not
   */
  listAll(): Promise<ResourceInfo<E>[]> {
    return this.lock.withRead(() => this.snapshot(false));
  }

  /**
   * Validate every resource, collecting failures by name
   */
  validateAll(): Promise<Map<string, ResourceError>> {
    return this.lock.withRead(() => {
      const failures = new Map<string, ResourceError>();

      for (const resource of this.visibleResources()) {
        try {
          validateResource(resource, this.kind);
        } catch (error) {
          if (!isResourceError(error)) throw error;
          failures.set(resource.name, error);
        }
      }

      return failures;
    });
  }

  /**
   * The live catalog object for `name`, for callers that need the loaded
   * body after loadFull. Programmatic registrations take precedence.
   */
  getResource(name: string): CapabilityResource<E> | undefined {
    return this.programmatic.get(name) ?? this.catalog.get(name);
  }

  private *visibleResources(): Generator<CapabilityResource<E>> {
    yield* this.programmatic.values();
    for (const [name, resource] of this.catalog) {
      if (!this.programmatic.has(name)) {
        yield resource;
      }
    }
  }

  private snapshot(activeOnly: boolean): ResourceInfo<E>[] {
    const infos: ResourceInfo<E>[] = [];

    for (const resource of this.visibleResources()) {
      const isActive = resource.sourceType === 'programmatic' || this.active.has(resource.name);
      if (activeOnly && !isActive) continue;
      infos.push(toResourceInfo(resource, this.kind, isActive));
    }

    return infos.sort(byName);
  }
}
