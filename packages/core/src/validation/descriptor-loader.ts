/**
 * Descriptor Loader
 *
 * Parses a serialized descriptor, validates it and returns an immutable
 * value. Loading is a single synchronous pass; a descriptor with any
 * violation is rejected as a whole.
 */

import { readFile } from 'node:fs/promises';
import type { ConfigurationField, ConnectorDescriptor } from '../types/index.js';
import { FIELD_TYPES, isKnownFieldType } from '../types/index.js';
import {
  DescriptorError,
  DuplicateKeyError,
  SchemaError,
  UnknownTypeError,
  type ErrorPath,
} from '../errors/index.js';
import { deepFreeze } from '../utils/index.js';
import {
  configurationFieldSchema,
  describeIssue,
  descriptorEnvelopeSchema,
} from './schemas.js';
import type { z } from 'zod';

export type DescriptorValidationResult =
  | { valid: true; descriptor: ConnectorDescriptor }
  | { valid: false; errors: DescriptorError[] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function issueToError(issue: z.ZodIssue, prefix: ErrorPath, descriptorId?: string): SchemaError {
  return new SchemaError({
    message: describeIssue(issue),
    descriptorId,
    path: [...prefix, ...issue.path],
  });
}

function validateField(
  raw: unknown,
  index: number,
  descriptorId?: string
): { field?: ConfigurationField; errors: DescriptorError[] } {
  const path: ErrorPath = ['configuration', index];

  if (!isPlainObject(raw)) {
    return {
      errors: [
        new SchemaError({
          message: 'Configuration field must be an object',
          descriptorId,
          path,
        }),
      ],
    };
  }

  const type = raw.type;
  if (type === undefined) {
    return {
      errors: [
        new SchemaError({
          message: "Missing required attribute 'type'",
          descriptorId,
          path: [...path, 'type'],
        }),
      ],
    };
  }
  if (typeof type !== 'string') {
    return {
      errors: [
        new SchemaError({
          message: "Attribute 'type' must be a string",
          descriptorId,
          path: [...path, 'type'],
        }),
      ],
    };
  }
  if (!isKnownFieldType(type)) {
    return { errors: [new UnknownTypeError(type, index, FIELD_TYPES, descriptorId)] };
  }

  const result = configurationFieldSchema.safeParse(raw);
  if (!result.success) {
    return { errors: result.error.issues.map((issue) => issueToError(issue, path, descriptorId)) };
  }
  return { field: result.data, errors: [] };
}

function findDuplicateKeys(entries: readonly unknown[], descriptorId?: string): DuplicateKeyError[] {
  const positions = new Map<string, number[]>();
  entries.forEach((entry, i) => {
    if (!isPlainObject(entry) || typeof entry.key !== 'string') return;
    const list = positions.get(entry.key) ?? [];
    list.push(i);
    positions.set(entry.key, list);
  });

  const errors: DuplicateKeyError[] = [];
  for (const [key, indices] of positions) {
    if (indices.length > 1) {
      errors.push(new DuplicateKeyError(key, indices, descriptorId));
    }
  }
  return errors;
}

/**
 * Validate an already-deserialized descriptor value.
 * Reports every violation found, top-level first, then per field in order,
 * then duplicate keys.
 */
export function validateDescriptor(input: unknown): DescriptorValidationResult {
  if (!isPlainObject(input)) {
    return {
      valid: false,
      errors: [new SchemaError({ message: 'Descriptor must be a JSON object', path: [] })],
    };
  }

  const descriptorId = typeof input.id === 'string' && input.id ? input.id : undefined;
  const errors: DescriptorError[] = [];

  const envelope = descriptorEnvelopeSchema.safeParse(input);
  if (!envelope.success) {
    errors.push(...envelope.error.issues.map((issue) => issueToError(issue, [], descriptorId)));
  }

  const rawFields = Array.isArray(input.configuration) ? input.configuration : [];
  const fields: ConfigurationField[] = [];
  rawFields.forEach((raw, i) => {
    const result = validateField(raw, i, descriptorId);
    errors.push(...result.errors);
    if (result.field) fields.push(result.field);
  });
  errors.push(...findDuplicateKeys(rawFields, descriptorId));

  if (errors.length > 0 || !envelope.success) {
    return { valid: false, errors };
  }

  const { configuration: _raw, ...attributes } = envelope.data;
  const descriptor: ConnectorDescriptor = { ...attributes, configuration: fields };
  return { valid: true, descriptor: deepFreeze(descriptor) };
}

/**
 * Validate a descriptor value, throwing the first violation.
 * @throws DescriptorError
 */
export function loadDescriptor(input: unknown): ConnectorDescriptor {
  const result = validateDescriptor(input);
  if (!result.valid) {
    const [first] = result.errors;
    throw first ?? new SchemaError({ message: 'Descriptor is invalid' });
  }
  return result.descriptor;
}

/**
 * Parse and validate a descriptor from JSON text.
 * @throws DescriptorError
 */
export function parseDescriptor(text: string): ConnectorDescriptor {
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = text.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new SchemaError({
      message: `Descriptor is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }
  return loadDescriptor(parsed);
}

/**
 * Read a descriptor file from disk.
 * @throws DescriptorError
 */
export async function loadDescriptorFile(filePath: string): Promise<ConnectorDescriptor> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new SchemaError({
      message: `Failed to read descriptor file: ${filePath}`,
      cause: err instanceof Error ? err : undefined,
      context: { filePath },
    });
  }
  return parseDescriptor(content);
}

function serializeField(field: ConfigurationField): Record<string, unknown> {
  return {
    label: field.label,
    key: field.key,
    type: field.type,
    choices: field.type === 'choice' ? field.choices.map((c) => ({ key: c.key, value: c.value })) : undefined,
    default: field.default,
    mandatory: field.mandatory,
    description: field.description,
  };
}

/**
 * Canonical JSON form: declared attributes only, in declaration order.
 */
export function serializeDescriptor(descriptor: ConnectorDescriptor): string {
  const ordered = {
    name: descriptor.name,
    id: descriptor.id,
    version: descriptor.version,
    mapping: descriptor.mapping,
    types: [...descriptor.types],
    description: descriptor.description,
    configuration: descriptor.configuration.map(serializeField),
  };
  return JSON.stringify(ordered, null, 2);
}
