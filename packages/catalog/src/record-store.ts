/**
 * Configuration record storage
 *
 * Holds one record per (tenant, connector). The host owns the lifecycle;
 * stores only persist what the configuration service hands them.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { ConfigurationRecord, ConfigurationValue } from '@siemlink/core';
import { DescriptorError } from '@siemlink/core';
import { encodeFileName } from './file-names.js';
import { SecretCipher } from './secret-cipher.js';

export interface ConfigurationStore {
  get(tenantId: string, descriptorId: string): Promise<ConfigurationRecord | undefined>;
  /** Insert or replace */
  put(record: ConfigurationRecord): Promise<void>;
  /** Returns false if there was no record */
  delete(tenantId: string, descriptorId: string): Promise<boolean>;
  list(tenantId: string): Promise<ConfigurationRecord[]>;
}

function cloneRecord(record: ConfigurationRecord): ConfigurationRecord {
  return {
    ...record,
    values: { ...record.values },
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
  };
}

export class InMemoryConfigurationStore implements ConfigurationStore {
  private readonly records = new Map<string, Map<string, ConfigurationRecord>>();

  async get(tenantId: string, descriptorId: string): Promise<ConfigurationRecord | undefined> {
    const record = this.records.get(tenantId)?.get(descriptorId);
    return record ? cloneRecord(record) : undefined;
  }

  async put(record: ConfigurationRecord): Promise<void> {
    const tenant = this.records.get(record.tenantId) ?? new Map<string, ConfigurationRecord>();
    tenant.set(record.descriptorId, cloneRecord(record));
    this.records.set(record.tenantId, tenant);
  }

  async delete(tenantId: string, descriptorId: string): Promise<boolean> {
    const tenant = this.records.get(tenantId);
    if (!tenant) return false;
    const existed = tenant.delete(descriptorId);
    if (tenant.size === 0) this.records.delete(tenantId);
    return existed;
  }

  async list(tenantId: string): Promise<ConfigurationRecord[]> {
    const tenant = this.records.get(tenantId);
    if (!tenant) return [];
    return [...tenant.values()]
      .map(cloneRecord)
      .sort((a, b) => a.descriptorId.localeCompare(b.descriptorId));
  }
}

const storedRecordSchema = z.object({
  descriptorId: z.string().min(1),
  descriptorVersion: z.string().min(1),
  values: z.record(z.union([z.string(), z.number()])),
  /** Keys whose values are encrypted */
  encrypted: z.array(z.string()),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

const tenantFileSchema = z.object({
  tenantId: z.string().min(1),
  records: z.record(storedRecordSchema),
});

type StoredRecord = z.infer<typeof storedRecordSchema>;
type TenantFile = z.infer<typeof tenantFileSchema>;

export interface FileConfigurationStoreOptions {
  dir: string;
  cipher: SecretCipher;
  /** Keys to encrypt for a given descriptor revision (its password fields) */
  secretKeys: (descriptorId: string, version: string) => ReadonlySet<string>;
}

/**
 * One JSON file per tenant. Password values are encrypted before they
 * reach disk and decrypted on read.
 *
 * Format: {dir}/{encoded tenantId}.json
 */
export class FileConfigurationStore implements ConfigurationStore {
  private static writeQueue = new Map<string, Promise<void>>();

  private readonly dir: string;
  private readonly cipher: SecretCipher;
  private readonly secretKeys: FileConfigurationStoreOptions['secretKeys'];

  constructor(options: FileConfigurationStoreOptions) {
    this.dir = options.dir;
    this.cipher = options.cipher;
    this.secretKeys = options.secretKeys;
  }

  async get(tenantId: string, descriptorId: string): Promise<ConfigurationRecord | undefined> {
    const file = await this.readTenant(tenantId);
    const stored =
      file && Object.hasOwn(file.records, descriptorId) ? file.records[descriptorId] : undefined;
    return stored ? this.decode(tenantId, stored) : undefined;
  }

  async put(record: ConfigurationRecord): Promise<void> {
    await this.mutate(record.tenantId, (file) => {
      file.records[record.descriptorId] = this.encode(record);
    });
  }

  async delete(tenantId: string, descriptorId: string): Promise<boolean> {
    let existed = false;
    await this.mutate(tenantId, (file) => {
      existed = Object.hasOwn(file.records, descriptorId);
      delete file.records[descriptorId];
    });
    return existed;
  }

  async list(tenantId: string): Promise<ConfigurationRecord[]> {
    const file = await this.readTenant(tenantId);
    if (!file) return [];
    return Object.values(file.records)
      .map((stored) => this.decode(tenantId, stored))
      .sort((a, b) => a.descriptorId.localeCompare(b.descriptorId));
  }

  private getFilePath(tenantId: string): string {
    return path.join(this.dir, `${encodeFileName(tenantId)}.json`);
  }

  private encode(record: ConfigurationRecord): StoredRecord {
    const secrets = this.secretKeys(record.descriptorId, record.descriptorVersion);
    const values: Record<string, ConfigurationValue> = {};
    const encrypted: string[] = [];
    for (const [key, value] of Object.entries(record.values)) {
      if (secrets.has(key) && typeof value === 'string') {
        values[key] = this.cipher.encrypt(value);
        encrypted.push(key);
      } else {
        values[key] = value;
      }
    }
    return {
      descriptorId: record.descriptorId,
      descriptorVersion: record.descriptorVersion,
      values,
      encrypted,
      createdAt: record.createdAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
    };
  }

  private decode(tenantId: string, stored: StoredRecord): ConfigurationRecord {
    const values: Record<string, ConfigurationValue> = {};
    const encrypted = new Set(stored.encrypted);
    for (const [key, value] of Object.entries(stored.values)) {
      values[key] = encrypted.has(key) && typeof value === 'string' ? this.cipher.decrypt(value) : value;
    }
    return {
      tenantId,
      descriptorId: stored.descriptorId,
      descriptorVersion: stored.descriptorVersion,
      values,
      createdAt: new Date(stored.createdAt),
      updatedAt: new Date(stored.updatedAt),
    };
  }

  private async readTenant(tenantId: string): Promise<TenantFile | undefined> {
    const filePath = this.getFilePath(tenantId);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: `Failed to read configuration file: ${filePath}`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: `Configuration file is not valid JSON: ${filePath}`,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const result = tenantFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: `Configuration file has an unexpected shape: ${filePath}`,
        context: { issues: result.error.issues.map((issue) => issue.message) },
      });
    }
    if (result.data.tenantId !== tenantId) {
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: `Configuration file ${filePath} belongs to tenant '${result.data.tenantId}'`,
      });
    }
    return result.data;
  }

  private async mutate(tenantId: string, change: (file: TenantFile) => void): Promise<void> {
    const filePath = this.getFilePath(tenantId);
    await this.enqueueWrite(filePath, async () => {
      const file = (await this.readTenant(tenantId)) ?? { tenantId, records: {} };
      change(file);

      try {
        await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });
        if (Object.keys(file.records).length === 0) {
          await fs.rm(filePath, { force: true });
          return;
        }
        const tmpPath = `${filePath}.tmp`;
        await fs.writeFile(tmpPath, `${JSON.stringify(file, null, 2)}\n`, {
          encoding: 'utf-8',
          mode: 0o600,
        });
        await fs.rename(tmpPath, filePath);
      } catch (err) {
        throw new DescriptorError({
          code: 'STORE_ERROR',
          message: `Failed to write configuration file: ${filePath}`,
          cause: err instanceof Error ? err : undefined,
        });
      }
    });
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = FileConfigurationStore.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<void> = next.finally(() => {
      if (FileConfigurationStore.writeQueue.get(filePath) === wrapped) {
        FileConfigurationStore.writeQueue.delete(filePath);
      }
    });
    FileConfigurationStore.writeQueue.set(filePath, wrapped);
    return wrapped;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
