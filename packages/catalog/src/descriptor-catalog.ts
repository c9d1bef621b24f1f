/**
 * Descriptor Catalog
 *
 * Host-side registry of connector descriptor revisions, keyed by
 * `(id, version)`. Revisions are never mutated; a new version is a new entry.
 */

import type { ConfigurationCheck, ConnectorDescriptor, ConnectorPlugin } from '@siemlink/core';
import {
  DescriptorError,
  compareVersions,
  loadDescriptor,
  parseDescriptor,
  serializeDescriptor,
} from '@siemlink/core';
import { Logger } from './logger.js';

interface CatalogEntry {
  descriptor: ConnectorDescriptor;
  check?: ConfigurationCheck;
  /** Canonical serialization, used to detect conflicting re-registration */
  canonical: string;
}

export interface CatalogListing {
  id: string;
  name: string;
  version: string;
  types: readonly string[];
  versions: string[];
}

function isPlugin(value: ConnectorPlugin | ConnectorDescriptor): value is ConnectorPlugin {
  return 'descriptor' in value;
}

export class DescriptorCatalog {
  private readonly revisions = new Map<string, Map<string, CatalogEntry>>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? new Logger();
  }

  /**
   * Register a descriptor revision, optionally with its connector check.
   * The descriptor is re-validated; nothing is stored if it is invalid.
   * @throws DescriptorError
   */
  register(entry: ConnectorPlugin | ConnectorDescriptor): ConnectorDescriptor {
    const plugin: ConnectorPlugin = isPlugin(entry) ? entry : { descriptor: entry };
    const descriptor = loadDescriptor(plugin.descriptor);
    return this.store(descriptor, plugin.check);
  }

  /**
   * Parse and register a serialized descriptor in one step.
   * @throws DescriptorError
   */
  registerSource(text: string, check?: ConfigurationCheck): ConnectorDescriptor {
    return this.store(parseDescriptor(text), check);
  }

  private store(descriptor: ConnectorDescriptor, check?: ConfigurationCheck): ConnectorDescriptor {
    const canonical = serializeDescriptor(descriptor);
    const versions = this.revisions.get(descriptor.id);
    const existing = versions?.get(descriptor.version);

    if (existing) {
      if (existing.canonical !== canonical) {
        throw new DescriptorError({
          code: 'DESCRIPTOR_CONFLICT',
          message: `Descriptor ${descriptor.id}@${descriptor.version} is already registered with different content`,
          descriptorId: descriptor.id,
          suggestion: 'Publish changed fields under a new version instead of editing a released one.',
        });
      }
      this.logger.debug('Descriptor already registered', {
        descriptorId: descriptor.id,
        version: descriptor.version,
      });
      return existing.descriptor;
    }

    const entry: CatalogEntry = { descriptor, check, canonical };
    if (versions) {
      versions.set(descriptor.version, entry);
    } else {
      this.revisions.set(descriptor.id, new Map([[descriptor.version, entry]]));
    }

    this.logger.info('Registered descriptor', {
      descriptorId: descriptor.id,
      version: descriptor.version,
      fields: descriptor.configuration.length,
    });
    return descriptor;
  }

  /**
   * Get a revision; the highest version when `version` is omitted
   */
  get(id: string, version?: string): ConnectorDescriptor | undefined {
    return this.entry(id, version)?.descriptor;
  }

  /**
   * @throws DescriptorError with code NOT_FOUND
   */
  getOrThrow(id: string, version?: string): ConnectorDescriptor {
    const descriptor = this.get(id, version);
    if (!descriptor) {
      const label = version ? `${id}@${version}` : id;
      const known = this.versions(id);
      throw new DescriptorError({
        code: 'NOT_FOUND',
        message: `Descriptor '${label}' is not registered`,
        descriptorId: id,
        suggestion: known.length
          ? `Registered versions: ${known.join(', ')}`
          : `Registered connectors: ${this.ids().join(', ') || 'none'}`,
      });
    }
    return descriptor;
  }

  /** Connector-specific check registered with a revision */
  checkFor(id: string, version?: string): ConfigurationCheck | undefined {
    return this.entry(id, version)?.check;
  }

  /** Registered versions of a connector, lowest first */
  versions(id: string): string[] {
    const versions = this.revisions.get(id);
    return versions ? [...versions.keys()].sort(compareVersions) : [];
  }

  ids(): string[] {
    return [...this.revisions.keys()].sort();
  }

  /** Latest revision of every registered connector */
  list(): CatalogListing[] {
    return this.ids().flatMap((id) => {
      const descriptor = this.get(id);
      if (!descriptor) return [];
      return [
        {
          id,
          name: descriptor.name,
          version: descriptor.version,
          types: descriptor.types,
          versions: this.versions(id),
        },
      ];
    });
  }

  /** Number of registered revisions */
  get size(): number {
    let count = 0;
    for (const versions of this.revisions.values()) count += versions.size;
    return count;
  }

  private entry(id: string, version?: string): CatalogEntry | undefined {
    const versions = this.revisions.get(id);
    if (!versions) return undefined;
    if (version) return versions.get(version);
    const latest = this.versions(id).at(-1);
    return latest ? versions.get(latest) : undefined;
  }
}
