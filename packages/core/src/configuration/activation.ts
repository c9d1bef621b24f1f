/**
 * Activation rules
 *
 * Turns operator input into the value map a configuration record stores:
 * defaults are applied, mandatory fields enforced, and each value checked
 * against its field kind.
 */

import type {
  ConfigurationField,
  ConfigurationValue,
  ConfigurationValues,
  ConnectorDescriptor,
  SuppliedValues,
} from '../types/index.js';
import { InvalidValueError, MissingMandatoryValueError } from '../errors/index.js';
import { deepFreeze } from '../utils/index.js';

function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim().length === 0)
  );
}

/**
 * Fields the operator must fill in before activation: mandatory with no
 * usable default. A blank default counts as none.
 */
export function requiredInputs(descriptor: ConnectorDescriptor): ConfigurationField[] {
  return descriptor.configuration.filter((field) => field.mandatory && isBlank(field.default));
}

function coerceValue(field: ConfigurationField, raw: unknown, descriptorId: string): ConfigurationValue {
  switch (field.type) {
    case 'text':
      if (typeof raw !== 'string') {
        throw new InvalidValueError(field.key, `expected a string, received ${typeof raw}`, descriptorId);
      }
      return raw.trim();

    // Secrets are stored exactly as supplied.
    case 'password':
      if (typeof raw !== 'string') {
        throw new InvalidValueError(field.key, `expected a string, received ${typeof raw}`, descriptorId);
      }
      return raw;

    case 'number': {
      if (typeof raw === 'number' && Number.isFinite(raw)) {
        return raw;
      }
      if (typeof raw === 'string') {
        const parsed = Number(raw.trim());
        if (Number.isFinite(parsed)) return parsed;
      }
      throw new InvalidValueError(field.key, 'expected a finite number', descriptorId);
    }

    case 'choice': {
      if (typeof raw !== 'string') {
        throw new InvalidValueError(field.key, `expected a string, received ${typeof raw}`, descriptorId);
      }
      if (!field.choices.some((choice) => choice.value === raw)) {
        const allowed = field.choices.map((choice) => choice.value).join(', ');
        throw new InvalidValueError(field.key, `'${raw}' is not one of: ${allowed}`, descriptorId);
      }
      return raw;
    }

    default: {
      const exhaustive: never = field;
      throw new Error(`Unsupported field type: ${(exhaustive as { type: string }).type}`);
    }
  }
}

/**
 * Resolve operator input against a descriptor.
 *
 * Absent, null and blank values count as not supplied. Every missing
 * mandatory key is reported in one error.
 *
 * @throws InvalidValueError for undeclared keys or values of the wrong kind
 * @throws MissingMandatoryValueError when mandatory fields have no value
 */
export function resolveConfiguration(
  descriptor: ConnectorDescriptor,
  supplied: SuppliedValues
): ConfigurationValues {
  const declared = new Set(descriptor.configuration.map((field) => field.key));
  for (const key of Object.keys(supplied)) {
    if (!declared.has(key)) {
      throw new InvalidValueError(key, 'not a configuration field of this connector', descriptor.id);
    }
  }

  const missing: string[] = [];
  const candidates = new Map<string, unknown>();
  for (const field of descriptor.configuration) {
    const raw = Object.hasOwn(supplied, field.key) ? supplied[field.key] : undefined;
    const candidate = isBlank(raw) ? field.default : raw;
    if (isBlank(candidate)) {
      if (field.mandatory) {
        missing.push(field.key);
        continue;
      }
      if (candidate === undefined) continue;
    }
    candidates.set(field.key, candidate);
  }

  if (missing.length > 0) {
    throw new MissingMandatoryValueError(missing, descriptor.id);
  }

  const values = Object.fromEntries(
    descriptor.configuration
      .filter((field) => candidates.has(field.key))
      .map((field): [string, ConfigurationValue] => [
        field.key,
        coerceValue(field, candidates.get(field.key), descriptor.id),
      ])
  );
  return deepFreeze(values);
}

/** Keys whose value differs between two value maps */
export function changedKeys(before: ConfigurationValues, after: ConfigurationValues): string[] {
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  const read = (values: ConfigurationValues, key: string) =>
    Object.hasOwn(values, key) ? values[key] : undefined;
  return [...keys].filter((key) => read(before, key) !== read(after, key)).sort();
}
