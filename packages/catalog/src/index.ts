/**
 * @siemlink/catalog
 *
 * Host-side descriptor catalog and tenant configuration lifecycle
 */

export { DescriptorCatalog, type CatalogListing } from './descriptor-catalog.js';
export {
  ConfigurationService,
  type ActivateOptions,
  type ConfigurationServiceOptions,
  type OperationOptions,
} from './configuration-service.js';
export {
  FileConfigurationStore,
  InMemoryConfigurationStore,
  type ConfigurationStore,
  type FileConfigurationStoreOptions,
} from './record-store.js';
export { SecretCipher } from './secret-cipher.js';
export {
  FileAuditStore,
  InMemoryAuditStore,
  type AuditEntry,
  type AuditOperation,
  type AuditStore,
} from './audit-store.js';
export { AuditTrail, type AuditQueryOptions, type AuditRecordInput } from './audit-trail.js';
export {
  ConfigError,
  expandEnvVars,
  hostConfigSchema,
  loadHostConfig,
  parseHostConfig,
  type HostConfig,
} from './config.js';
export { createHost, type Host, type HostOptions } from './host.js';
export { Logger, redactSecrets, type LogFormat, type LogLevel, type LogSink } from './logger.js';
export { runCli, type CliIo } from './commands.js';
