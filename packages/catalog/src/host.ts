/**
 * Wires a catalog, record store, audit trail and configuration service
 * from a host config.
 */

import { loadDescriptorFile, secretKeys, wrapError } from '@siemlink/core';
import { createMcasPlugin } from '@siemlink/connector-mcas';
import { AuditTrail } from './audit-trail.js';
import { FileAuditStore, InMemoryAuditStore } from './audit-store.js';
import { ConfigError, type HostConfig, type StoreConfig } from './config.js';
import { ConfigurationService } from './configuration-service.js';
import { DescriptorCatalog } from './descriptor-catalog.js';
import { Logger, type LogSink } from './logger.js';
import {
  FileConfigurationStore,
  InMemoryConfigurationStore,
  type ConfigurationStore,
} from './record-store.js';
import { SecretCipher } from './secret-cipher.js';

export interface Host {
  logger: Logger;
  catalog: DescriptorCatalog;
  store: ConfigurationStore;
  audit?: AuditTrail;
  service: ConfigurationService;
}

export interface HostOptions {
  env?: NodeJS.ProcessEnv;
  logSink?: LogSink;
}

function createStore(
  config: StoreConfig | undefined,
  catalog: DescriptorCatalog,
  env: NodeJS.ProcessEnv
): ConfigurationStore {
  if (!config || config.kind === 'memory') {
    return new InMemoryConfigurationStore();
  }

  const secret = env[config.secretKeyEnv];
  if (!secret) {
    throw new ConfigError(`Missing required environment variable: ${config.secretKeyEnv}`);
  }
  return new FileConfigurationStore({
    dir: config.dir,
    cipher: new SecretCipher(secret),
    secretKeys: (descriptorId, version) => secretKeys(catalog.getOrThrow(descriptorId, version)),
  });
}

/**
 * Build a host. Every descriptor must load; a single bad file aborts
 * startup so no revision is half-registered.
 * @throws ConfigError, DescriptorError
 */
export async function createHost(config: HostConfig, options: HostOptions = {}): Promise<Host> {
  const logger = new Logger({
    level: config.logging?.level,
    format: config.logging?.format,
    sink: options.logSink,
  });
  const catalog = new DescriptorCatalog({ logger });

  if (config.builtins !== false) {
    catalog.register(createMcasPlugin());
  }

  for (const filePath of config.descriptors ?? []) {
    try {
      catalog.register(await loadDescriptorFile(filePath));
    } catch (err) {
      const error = wrapError(err);
      logger.error('Failed to register descriptor', { filePath, code: error.code, error: error.message });
      throw error;
    }
  }

  const store = createStore(config.store, catalog, options.env ?? process.env);

  let audit: AuditTrail | undefined;
  if (config.audit?.enabled) {
    const auditStore = config.audit.logDir
      ? new FileAuditStore(config.audit.logDir, logger)
      : new InMemoryAuditStore();
    audit = new AuditTrail(auditStore);
  }

  const service = new ConfigurationService({ catalog, store, audit, logger });
  return { logger, catalog, store, audit, service };
}
