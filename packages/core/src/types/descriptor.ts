/**
 * Connector descriptor types
 *
 * A descriptor is the declarative record a host platform loads to learn a
 * connector's identity and the settings an operator must supply.
 */

/** Ingestion categories a host can route to a connector */
export const INGESTION_TYPES = ['events', 'alerts', 'webtx'] as const;

export type IngestionType = (typeof INGESTION_TYPES)[number];

/** Field kinds the settings form knows how to render and validate */
export const FIELD_TYPES = ['text', 'password', 'number', 'choice'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

interface FieldBase {
  /** Operator-facing name */
  readonly label: string;
  /** Storage key in the tenant's configuration record */
  readonly key: string;
  /** Activation is refused until this field holds a non-empty value */
  readonly mandatory: boolean;
  /** Guidance shown under the input */
  readonly description?: string;
}

export interface TextField extends FieldBase {
  readonly type: 'text';
  readonly default?: string;
}

/** Secret value: masked in UI, never logged, encrypted at rest */
export interface PasswordField extends FieldBase {
  readonly type: 'password';
  readonly default?: string;
}

export interface NumberField extends FieldBase {
  readonly type: 'number';
  readonly default?: number;
}

export interface ChoiceOption {
  /** Display text */
  readonly key: string;
  /** Stored value */
  readonly value: string;
}

export interface ChoiceField extends FieldBase {
  readonly type: 'choice';
  readonly choices: readonly ChoiceOption[];
  readonly default?: string;
}

export type ConfigurationField = TextField | PasswordField | NumberField | ChoiceField;

export interface ConnectorDescriptor {
  readonly name: string;
  /** Stable across versions; unique in the host's catalog */
  readonly id: string;
  /** Semantic version; `(id, version)` identifies one revision */
  readonly version: string;
  /** Name of the default field-mapping profile */
  readonly mapping?: string;
  readonly types: readonly IngestionType[];
  readonly description?: string;
  readonly configuration: readonly ConfigurationField[];
}

export function isKnownFieldType(value: string): value is FieldType {
  return (FIELD_TYPES as readonly string[]).includes(value);
}

export function isKnownIngestionType(value: string): value is IngestionType {
  return (INGESTION_TYPES as readonly string[]).includes(value);
}
