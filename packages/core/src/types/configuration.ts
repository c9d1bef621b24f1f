/**
 * Tenant configuration types
 */

import type { ConnectorDescriptor } from './descriptor.js';

/** Value stored for a single configuration field */
export type ConfigurationValue = string | number;

/** Values keyed by field key */
export type ConfigurationValues = Readonly<Record<string, ConfigurationValue>>;

/** Raw operator input, before defaults and kind checks are applied */
export type SuppliedValues = Readonly<Record<string, unknown>>;

/**
 * Per-tenant instance data for an activated connector.
 * Created on activation, replaced on edit, removed on deactivation.
 */
export interface ConfigurationRecord {
  tenantId: string;
  descriptorId: string;
  /** Descriptor revision the values were validated against */
  descriptorVersion: string;
  values: ConfigurationValues;
  createdAt: Date;
  updatedAt: Date;
}

/** A single problem reported by a connector-specific configuration check */
export interface ConfigurationIssue {
  key: string;
  message: string;
}

export interface ConfigurationCheckResult {
  valid: boolean;
  issues: ConfigurationIssue[];
}

/**
 * Connector-specific validation run after the generic activation rules,
 * e.g. URL shape or identifier format.
 */
export type ConfigurationCheck = (values: ConfigurationValues) => ConfigurationCheckResult;

/** A descriptor together with its optional connector check */
export interface ConnectorPlugin {
  descriptor: ConnectorDescriptor;
  check?: ConfigurationCheck;
}
