/**
 * Audit Trail
 *
 * Records every change to a tenant's configuration record. Password values
 * are masked here, before an entry reaches any store.
 */

import { randomUUID } from 'node:crypto';
import type { ConfigurationValues, ConnectorDescriptor } from '@siemlink/core';
import { maskConfiguration } from '@siemlink/core';
import type { AuditEntry, AuditOperation, AuditStore } from './audit-store.js';

export interface AuditRecordInput {
  descriptor: ConnectorDescriptor;
  /** Revision `before` was validated against, when it differs (upgrades) */
  previous?: ConnectorDescriptor;
  tenantId: string;
  operation: AuditOperation;
  actor?: string;
  before?: ConfigurationValues;
  after?: ConfigurationValues;
  changedFields?: string[];
}

export interface AuditQueryOptions {
  connectorId: string;
  tenantId?: string;
  operation?: AuditOperation | AuditOperation[];
  /** From this date (inclusive) */
  from?: Date;
  /** To this date (inclusive) */
  to?: Date;
  limit?: number;
}

export class AuditTrail {
  constructor(
    private readonly store: AuditStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async record(input: AuditRecordInput): Promise<AuditEntry> {
    const { descriptor } = input;
    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: this.clock(),
      tenantId: input.tenantId,
      connectorId: descriptor.id,
      descriptorVersion: descriptor.version,
      operation: input.operation,
      actor: input.actor,
      before: input.before
        ? maskConfiguration(input.previous ?? descriptor, input.before)
        : undefined,
      after: input.after ? maskConfiguration(descriptor, input.after) : undefined,
      changedFields: input.changedFields,
    };

    await this.store.append(entry);
    return entry;
  }

  async query(options: AuditQueryOptions): Promise<AuditEntry[]> {
    const to = options.to;
    const entries = options.from
      ? await this.store.readRange(options.connectorId, options.from, to ?? this.clock())
      : (await this.store.readAll(options.connectorId)).filter((entry) => !to || entry.timestamp <= to);

    const operations = options.operation
      ? new Set(Array.isArray(options.operation) ? options.operation : [options.operation])
      : undefined;

    const filtered = entries.filter(
      (entry) =>
        (!options.tenantId || entry.tenantId === options.tenantId) &&
        (!operations || operations.has(entry.operation))
    );
    return options.limit !== undefined ? filtered.slice(0, options.limit) : filtered;
  }
}
