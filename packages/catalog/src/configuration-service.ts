/**
 * Configuration Service
 *
 * Owns the lifecycle of per-tenant configuration records: activation,
 * edits, descriptor upgrades and deactivation. Activation-time errors are
 * recoverable; they are logged and rethrown for the caller to prompt the
 * operator.
 */

import type {
  ConfigurationRecord,
  ConfigurationValues,
  ConnectorDescriptor,
  SuppliedValues,
} from '@siemlink/core';
import {
  DescriptorError,
  InvalidValueError,
  SECRET_MASK,
  changedKeys,
  compareVersions,
  maskRecord,
  resolveConfiguration,
  secretKeys,
  wrapError,
} from '@siemlink/core';
import type { AuditRecordInput, AuditTrail } from './audit-trail.js';
import type { DescriptorCatalog } from './descriptor-catalog.js';
import { Logger } from './logger.js';
import type { ConfigurationStore } from './record-store.js';

export interface ConfigurationServiceOptions {
  catalog: DescriptorCatalog;
  store: ConfigurationStore;
  audit?: AuditTrail;
  logger?: Logger;
  clock?: () => Date;
}

export interface OperationOptions {
  /** Recorded in the audit trail */
  actor?: string;
}

export interface ActivateOptions extends OperationOptions {
  /** Descriptor revision to activate; latest when omitted */
  version?: string;
}

type Operation = 'activate' | 'update' | 'upgrade' | 'deactivate' | 'export';

export class ConfigurationService {
  private readonly catalog: DescriptorCatalog;
  private readonly store: ConfigurationStore;
  private readonly audit?: AuditTrail;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  /** Tail of the operation queue per tenant and connector */
  private readonly pending = new Map<string, Promise<unknown>>();

  constructor(options: ConfigurationServiceOptions) {
    this.catalog = options.catalog;
    this.store = options.store;
    this.audit = options.audit;
    this.logger = options.logger ?? new Logger();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Create a tenant's configuration record for a connector.
   * @throws MissingMandatoryValueError, InvalidValueError, DescriptorError (NOT_FOUND, ALREADY_ACTIVE)
   */
  async activate(
    tenantId: string,
    connectorId: string,
    values: SuppliedValues,
    options: ActivateOptions = {}
  ): Promise<ConfigurationRecord> {
    return this.run('activate', tenantId, connectorId, async () => {
      const descriptor = this.catalog.getOrThrow(connectorId, options.version);

      if (await this.store.get(tenantId, connectorId)) {
        throw new DescriptorError({
          code: 'ALREADY_ACTIVE',
          message: `Connector '${connectorId}' is already active for tenant '${tenantId}'`,
          descriptorId: connectorId,
          suggestion: 'Edit the existing configuration or deactivate it first.',
        });
      }

      const resolved = this.resolve(descriptor, values);
      const now = this.clock();
      const record: ConfigurationRecord = {
        tenantId,
        descriptorId: descriptor.id,
        descriptorVersion: descriptor.version,
        values: resolved,
        createdAt: now,
        updatedAt: now,
      };

      await this.commit(
        () => this.store.put(record),
        async () => {
          await this.store.delete(tenantId, connectorId);
        },
        { descriptor, tenantId, operation: 'create', actor: options.actor, after: resolved }
      );

      this.logger.info('Activated connector', {
        tenantId,
        descriptorId: descriptor.id,
        version: descriptor.version,
      });
      return record;
    });
  }

  /**
   * Apply an operator's edits. A password key that is absent, blank, or
   * still shows the mask keeps its stored value.
   * @throws MissingMandatoryValueError, InvalidValueError, DescriptorError (NOT_FOUND)
   */
  async update(
    tenantId: string,
    connectorId: string,
    patch: SuppliedValues,
    options: OperationOptions = {}
  ): Promise<ConfigurationRecord> {
    return this.run('update', tenantId, connectorId, async () => {
      const existing = await this.getOrThrow(tenantId, connectorId);
      const descriptor = this.catalog.getOrThrow(connectorId, existing.descriptorVersion);

      const merged = mergeValues(descriptor, existing.values, patch);
      const resolved = this.resolve(descriptor, merged);
      const changed = changedKeys(existing.values, resolved);
      if (changed.length === 0) {
        return existing;
      }

      const record: ConfigurationRecord = { ...existing, values: resolved, updatedAt: this.clock() };
      await this.commit(
        () => this.store.put(record),
        () => this.store.put(existing),
        {
          descriptor,
          tenantId,
          operation: 'update',
          actor: options.actor,
          before: existing.values,
          after: resolved,
          changedFields: changed,
        }
      );

      this.logger.info('Updated connector configuration', {
        tenantId,
        descriptorId: descriptor.id,
        changedFields: changed,
      });
      return record;
    });
  }

  /**
   * Move a record to a newer descriptor revision.
   *
   * Values of keys the new revision still declares carry over, removed keys
   * are dropped, and `values` fills in or overrides fields. The result must
   * pass activation against the new revision; otherwise the record stays on
   * its current revision.
   *
   * @throws MissingMandatoryValueError, InvalidValueError, DescriptorError
   */
  async upgrade(
    tenantId: string,
    connectorId: string,
    values: SuppliedValues = {},
    options: ActivateOptions = {}
  ): Promise<ConfigurationRecord> {
    return this.run('upgrade', tenantId, connectorId, async () => {
      const existing = await this.getOrThrow(tenantId, connectorId);
      const previous = this.catalog.getOrThrow(connectorId, existing.descriptorVersion);
      const target = this.catalog.getOrThrow(connectorId, options.version);

      const order = compareVersions(target.version, existing.descriptorVersion);
      if (order === 0) {
        return existing;
      }
      if (order < 0) {
        throw new DescriptorError({
          code: 'DESCRIPTOR_CONFLICT',
          message: `Cannot move '${connectorId}' from ${existing.descriptorVersion} down to ${target.version}`,
          descriptorId: connectorId,
        });
      }

      const declared = new Set(target.configuration.map((field) => field.key));
      const carried: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(existing.values)) {
        if (declared.has(key)) carried[key] = value;
      }

      const merged = mergeValues(target, carried, values);
      const resolved = this.resolve(target, merged);
      const record: ConfigurationRecord = {
        ...existing,
        descriptorVersion: target.version,
        values: resolved,
        updatedAt: this.clock(),
      };

      await this.commit(
        () => this.store.put(record),
        () => this.store.put(existing),
        {
          descriptor: target,
          previous,
          tenantId,
          operation: 'upgrade',
          actor: options.actor,
          before: existing.values,
          after: resolved,
          changedFields: changedKeys(existing.values, resolved),
        }
      );

      this.logger.info('Upgraded connector configuration', {
        tenantId,
        descriptorId: connectorId,
        from: existing.descriptorVersion,
        to: target.version,
      });
      return record;
    });
  }

  /**
   * Remove a tenant's configuration record.
   * @throws DescriptorError (NOT_FOUND)
   */
  async deactivate(
    tenantId: string,
    connectorId: string,
    options: OperationOptions = {}
  ): Promise<void> {
    await this.run('deactivate', tenantId, connectorId, async () => {
      const existing = await this.getOrThrow(tenantId, connectorId);
      const descriptor = this.catalog.getOrThrow(connectorId, existing.descriptorVersion);

      await this.commit(
        async () => {
          await this.store.delete(tenantId, connectorId);
        },
        () => this.store.put(existing),
        { descriptor, tenantId, operation: 'delete', actor: options.actor, before: existing.values }
      );

      this.logger.info('Deactivated connector', { tenantId, descriptorId: connectorId });
    });
  }

  async get(tenantId: string, connectorId: string): Promise<ConfigurationRecord | undefined> {
    return this.store.get(tenantId, connectorId);
  }

  async list(tenantId: string): Promise<ConfigurationRecord[]> {
    return this.store.list(tenantId);
  }

  /**
   * Record with password values masked, safe to display or export.
   * @throws DescriptorError (NOT_FOUND)
   */
  async export(tenantId: string, connectorId: string): Promise<ConfigurationRecord> {
    return this.run('export', tenantId, connectorId, async () => {
      const record = await this.getOrThrow(tenantId, connectorId);
      const descriptor = this.catalog.getOrThrow(connectorId, record.descriptorVersion);
      return maskRecord(descriptor, record);
    });
  }

  private resolve(descriptor: ConnectorDescriptor, supplied: SuppliedValues): ConfigurationValues {
    const values = resolveConfiguration(descriptor, supplied);
    const check = this.catalog.checkFor(descriptor.id, descriptor.version);
    if (!check) return values;

    const result = check(values);
    const [first] = result.issues;
    if (!result.valid && first) {
      throw new InvalidValueError(
        first.key,
        result.issues.map((issue) => issue.message).join('; '),
        descriptor.id
      );
    }
    return values;
  }

  /**
   * Apply a store change and audit it. When the audit entry cannot be
   * written the change is undone, so the store never holds an unaudited
   * change.
   */
  private async commit(
    change: () => Promise<void>,
    undo: () => Promise<void>,
    entry: AuditRecordInput
  ): Promise<void> {
    await change();
    if (!this.audit) return;

    try {
      await this.audit.record(entry);
    } catch (err) {
      await undo();
      throw wrapError(err, entry.descriptor.id, 'AUDIT_LOG_ERROR');
    }
  }

  /**
   * Run operations on the same tenant and connector one at a time, so a
   * check-then-write sequence cannot interleave with another.
   */
  private enqueue<T>(key: string, op: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(key) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<T> = next.finally(() => {
      if (this.pending.get(key) === wrapped) {
        this.pending.delete(key);
      }
    });
    this.pending.set(key, wrapped);
    return wrapped;
  }

  private async getOrThrow(tenantId: string, connectorId: string): Promise<ConfigurationRecord> {
    const record = await this.store.get(tenantId, connectorId);
    if (!record) {
      throw new DescriptorError({
        code: 'NOT_FOUND',
        message: `Connector '${connectorId}' is not active for tenant '${tenantId}'`,
        descriptorId: connectorId,
      });
    }
    return record;
  }

  private async run<T>(
    operation: Operation,
    tenantId: string,
    connectorId: string,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await this.enqueue(`${tenantId}\u0000${connectorId}`, fn);
    } catch (err) {
      const error = wrapError(err, connectorId);
      const level = error.recoverable ? 'warn' : 'error';
      this.logger.log(level, `Connector ${operation} rejected`, {
        tenantId,
        descriptorId: connectorId,
        code: error.code,
        error: error.message,
      });
      throw error;
    }
  }
}

/**
 * Overlay operator input on stored values. Secrets that come back blank or
 * masked keep the stored value.
 */
function mergeValues(
  descriptor: ConnectorDescriptor,
  base: Readonly<Record<string, unknown>>,
  patch: SuppliedValues
): Record<string, unknown> {
  const secrets = secretKeys(descriptor);
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const unchangedSecret =
      secrets.has(key) &&
      Object.hasOwn(base, key) &&
      (value === undefined ||
        value === null ||
        value === SECRET_MASK ||
        (typeof value === 'string' && value.trim().length === 0));
    if (!unchangedSecret) {
      merged[key] = value;
    }
  }
  return merged;
}
