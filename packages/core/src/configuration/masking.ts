import type {
  ConfigurationRecord,
  ConfigurationValue,
  ConfigurationValues,
  ConnectorDescriptor,
} from '../types/index.js';

export const SECRET_MASK = '********';

/** Keys of every password field in the descriptor */
export function secretKeys(descriptor: ConnectorDescriptor): Set<string> {
  return new Set(
    descriptor.configuration.filter((field) => field.type === 'password').map((field) => field.key)
  );
}

/**
 * Copy of `values` with password fields replaced by a fixed mask.
 * Every export, log line and audit entry goes through this.
 */
export function maskConfiguration(
  descriptor: ConnectorDescriptor,
  values: ConfigurationValues
): Record<string, ConfigurationValue> {
  const secrets = secretKeys(descriptor);
  return Object.fromEntries(
    Object.entries(values).map(([key, value]): [string, ConfigurationValue] => [
      key,
      secrets.has(key) ? SECRET_MASK : value,
    ])
  );
}

export function maskRecord(
  descriptor: ConnectorDescriptor,
  record: ConfigurationRecord
): ConfigurationRecord {
  return { ...record, values: maskConfiguration(descriptor, record.values) };
}
