/**
 * Audit Store
 *
 * Append-only storage for configuration audit entries.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DescriptorError } from '@siemlink/core';
import { encodeFileName } from './file-names.js';
import type { Logger } from './logger.js';

/** Lifecycle step that produced the entry */
export type AuditOperation = 'create' | 'update' | 'upgrade' | 'delete';

/**
 * Single audit log entry. Values are always masked before they get here.
 */
export interface AuditEntry {
  /** Unique entry ID (UUID) */
  id: string;
  timestamp: Date;
  tenantId: string;
  connectorId: string;
  /** Descriptor revision after the operation (before it, for deletes) */
  descriptorVersion: string;
  operation: AuditOperation;
  /** Who performed the operation (optional) */
  actor?: string;
  before?: Record<string, string | number>;
  after?: Record<string, string | number>;
  /** Keys that changed (for update and upgrade) */
  changedFields?: string[];
}

export interface AuditStore {
  append(entry: AuditEntry): Promise<void>;
  /** Entries whose timestamp falls in [from, to], newest first */
  readRange(connectorId: string, from: Date, to: Date): Promise<AuditEntry[]>;
  /** All entries for a connector, newest first */
  readAll(connectorId: string): Promise<AuditEntry[]>;
}

const valuesSchema = z.record(z.union([z.string(), z.number()]));

const auditEntrySchema = z.object({
  id: z.string().min(1),
  timestamp: z.coerce.date(),
  tenantId: z.string().min(1),
  connectorId: z.string().min(1),
  descriptorVersion: z.string().min(1),
  operation: z.enum(['create', 'update', 'upgrade', 'delete']),
  actor: z.string().optional(),
  before: valuesSchema.optional(),
  after: valuesSchema.optional(),
  changedFields: z.array(z.string()).optional(),
});

function newestFirst(a: AuditEntry, b: AuditEntry): number {
  return b.timestamp.getTime() - a.timestamp.getTime();
}

export class InMemoryAuditStore implements AuditStore {
  private readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push({ ...entry, timestamp: new Date(entry.timestamp) });
  }

  async readRange(connectorId: string, from: Date, to: Date): Promise<AuditEntry[]> {
    return (await this.readAll(connectorId)).filter(
      (entry) => entry.timestamp >= from && entry.timestamp <= to
    );
  }

  async readAll(connectorId: string): Promise<AuditEntry[]> {
    return this.entries.filter((entry) => entry.connectorId === connectorId).sort(newestFirst);
  }
}

/**
 * Manages audit log storage on the filesystem.
 *
 * Entries are stored in daily files for efficient querying by date range.
 * Format: {baseDir}/{encoded connectorId}/{YYYY-MM-DD}.ndjson (one JSON object per line, UTC days)
 */
export class FileAuditStore implements AuditStore {
  private static writeQueue = new Map<string, Promise<void>>();

  constructor(
    private readonly baseDir: string = './.audit-logs',
    private readonly logger?: Logger
  ) {}

  private getConnectorDir(connectorId: string): string {
    return path.join(this.baseDir, encodeFileName(connectorId));
  }

  private getFilePath(connectorId: string, date: Date): string {
    const dateStr = date.toISOString().split('T')[0]; // YYYY-MM-DD
    return path.join(this.getConnectorDir(connectorId), `${dateStr}.ndjson`);
  }

  async append(entry: AuditEntry): Promise<void> {
    const dir = this.getConnectorDir(entry.connectorId);
    const filePath = this.getFilePath(entry.connectorId, entry.timestamp);
    const line = `${JSON.stringify(entry)}\n`;

    try {
      await fs.mkdir(dir, { recursive: true, mode: 0o700 });
      await this.enqueueWrite(filePath, async () => {
        await fs.appendFile(filePath, line, { encoding: 'utf-8', mode: 0o600 });
      });
    } catch (err) {
      throw new DescriptorError({
        code: 'AUDIT_LOG_ERROR',
        message: 'Failed to write audit log entry',
        descriptorId: entry.connectorId,
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  async readRange(connectorId: string, from: Date, to: Date): Promise<AuditEntry[]> {
    const entries: AuditEntry[] = [];
    for (const date of this.getDateRange(from, to)) {
      const dayEntries = await this.readNdjsonFile(this.getFilePath(connectorId, date), connectorId);
      for (const entry of dayEntries) {
        if (entry.timestamp >= from && entry.timestamp <= to) {
          entries.push(entry);
        }
      }
    }
    return entries.sort(newestFirst);
  }

  async readAll(connectorId: string): Promise<AuditEntry[]> {
    const connectorDir = this.getConnectorDir(connectorId);
    let files: string[];
    try {
      files = await fs.readdir(connectorDir);
    } catch {
      // No logs for this connector yet
      return [];
    }

    const entries: AuditEntry[] = [];
    for (const file of files) {
      if (!file.endsWith('.ndjson')) continue;
      entries.push(...(await this.readNdjsonFile(path.join(connectorDir, file), connectorId)));
    }
    return entries.sort(newestFirst);
  }

  /**
   * UTC days touched by the range
   */
  private getDateRange(from: Date, to: Date): Date[] {
    const dates: Date[] = [];
    const current = new Date(Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate()));
    while (current <= to) {
      dates.push(new Date(current));
      current.setUTCDate(current.getUTCDate() + 1);
    }
    return dates;
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = FileAuditStore.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<void> = next.finally(() => {
      if (FileAuditStore.writeQueue.get(filePath) === wrapped) {
        FileAuditStore.writeQueue.delete(filePath);
      }
    });
    FileAuditStore.writeQueue.set(filePath, wrapped);
    return wrapped;
  }

  private async readNdjsonFile(filePath: string, connectorId: string): Promise<AuditEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch {
      return [];
    }

    const entries: AuditEntry[] = [];
    const lines = content.split('\n').filter((line) => line.trim().length > 0);
    for (const [i, line] of lines.entries()) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        this.logger?.warn('Skipping unparseable audit line', { filePath, line: i + 1 });
        continue;
      }
      const result = auditEntrySchema.safeParse(raw);
      if (result.success) {
        if (result.data.connectorId === connectorId) entries.push(result.data);
      } else {
        this.logger?.warn('Skipping malformed audit entry', { filePath, line: i + 1 });
      }
    }
    return entries;
  }
}
