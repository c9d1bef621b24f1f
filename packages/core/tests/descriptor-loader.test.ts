import { describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DuplicateKeyError,
  SchemaError,
  UnknownTypeError,
  loadDescriptor,
  loadDescriptorFile,
  parseDescriptor,
  serializeDescriptor,
  validateDescriptor,
} from '../src/index.js';

function sampleDescriptor(): Record<string, unknown> {
  return {
    name: 'Syslog Forwarder',
    id: 'syslog_cls',
    version: '1.2.0',
    mapping: 'Syslog Default Mappings',
    types: ['events', 'alerts'],
    description: 'Forwards events over syslog.',
    configuration: [
      { label: 'Server', key: 'server', type: 'text', mandatory: true },
      { label: 'Port', key: 'port', type: 'number', default: 514, mandatory: true },
      { label: 'API Key', key: 'api_key', type: 'password', mandatory: false },
      {
        label: 'Protocol',
        key: 'protocol',
        type: 'choice',
        choices: [
          { key: 'UDP', value: 'udp' },
          { key: 'TCP', value: 'tcp' },
        ],
        default: 'udp',
        mandatory: true,
        description: 'Transport used to reach the server.',
      },
    ],
  };
}

function withFields(fields: unknown[]): Record<string, unknown> {
  return { ...sampleDescriptor(), configuration: fields };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

describe('validateDescriptor', () => {
  it('accepts a well-formed descriptor and freezes it', () => {
    const result = validateDescriptor(sampleDescriptor());

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    const { descriptor } = result;
    expect(descriptor.id).toBe('syslog_cls');
    expect(descriptor.configuration.map((field) => field.key)).toEqual([
      'server',
      'port',
      'api_key',
      'protocol',
    ]);
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.configuration)).toBe(true);
    expect(Object.isFrozen(descriptor.configuration[3])).toBe(true);
  });

  it('drops unknown top-level attributes', () => {
    const descriptor = loadDescriptor({ ...sampleDescriptor(), icon: 'logo.png' });

    expect('icon' in descriptor).toBe(false);
  });

  it('yields identical structures when loading the same input twice', () => {
    const text = JSON.stringify(sampleDescriptor());

    expect(parseDescriptor(text)).toEqual(parseDescriptor(text));
  });

  it('rejects a field entry without a key as a schema error', () => {
    const err = captureError(() =>
      loadDescriptor(
        withFields([
          { label: 'Server', key: 'server', type: 'text', mandatory: true },
          { label: 'Token', type: 'password', mandatory: true },
        ])
      )
    );

    expect(err).toBeInstanceOf(SchemaError);
    if (!(err instanceof SchemaError)) return;
    expect(err.code).toBe('SCHEMA_ERROR');
    expect(err.message).toBe("Missing required attribute 'key'");
    expect(err.path).toEqual(['configuration', 1, 'key']);
    expect(err.descriptorId).toBe('syslog_cls');
  });

  it('rejects two fields sharing a key', () => {
    const err = captureError(() =>
      loadDescriptor(
        withFields([
          { label: 'Server', key: 'server', type: 'text', mandatory: true },
          { label: 'Token', key: 'token', type: 'password', mandatory: true },
          { label: 'Backup token', key: 'token', type: 'password', mandatory: false },
        ])
      )
    );

    expect(err).toBeInstanceOf(DuplicateKeyError);
    if (!(err instanceof DuplicateKeyError)) return;
    expect(err.code).toBe('DUPLICATE_KEY');
    expect(err.key).toBe('token');
    expect(err.indices).toEqual([1, 2]);
    expect(err.path).toEqual(['configuration', 2, 'key']);
  });

  it('rejects a field type outside the enumeration', () => {
    const err = captureError(() =>
      loadDescriptor(withFields([{ label: 'Enabled', key: 'enabled', type: 'checkbox', mandatory: false }]))
    );

    expect(err).toBeInstanceOf(UnknownTypeError);
    if (!(err instanceof UnknownTypeError)) return;
    expect(err.fieldType).toBe('checkbox');
    expect(err.path).toEqual(['configuration', 0, 'type']);
    expect(err.suggestion).toBe('Use one of: text, password, number, choice.');
  });

  it('reports every violation in order', () => {
    const { name: _name, ...withoutName } = sampleDescriptor();
    const result = validateDescriptor({
      ...withoutName,
      configuration: [
        { label: 'A', key: 'a', type: 'checkbox', mandatory: true },
        { label: 'B', key: 'a', type: 'text', mandatory: false },
      ],
    });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors.map((error) => error.code)).toEqual([
      'SCHEMA_ERROR',
      'UNKNOWN_TYPE',
      'DUPLICATE_KEY',
    ]);
    expect(result.errors[0]?.message).toBe("Missing required attribute 'name'");
  });

  it('requires at least one known ingestion type', () => {
    const empty = validateDescriptor({ ...sampleDescriptor(), types: [] });
    expect(empty.valid).toBe(false);
    if (!empty.valid) {
      expect(empty.errors[0]?.message).toBe("Attribute 'types' must list at least one ingestion type");
      expect(empty.errors[0]?.path).toEqual(['types']);
    }

    const unknown = validateDescriptor({ ...sampleDescriptor(), types: ['metrics'] });
    expect(unknown.valid).toBe(false);
    if (!unknown.valid) {
      expect(unknown.errors[0]?.path).toEqual(['types', 0]);
    }
  });

  it('requires a semantic version', () => {
    const result = validateDescriptor({ ...sampleDescriptor(), version: 'v1' });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors[0]?.message).toBe("Attribute 'version' must be a semantic version (x.y.z)");
  });

  it('requires defaults to match the field kind', () => {
    const result = validateDescriptor(
      withFields([{ label: 'Port', key: 'port', type: 'number', default: '514', mandatory: true }])
    );

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors[0]).toBeInstanceOf(SchemaError);
    expect(result.errors[0]?.path).toEqual(['configuration', 0, 'default']);
  });

  it('requires a choice default to be a declared value', () => {
    const result = validateDescriptor(
      withFields([
        {
          label: 'Protocol',
          key: 'protocol',
          type: 'choice',
          choices: [{ key: 'UDP', value: 'udp' }],
          default: 'tls',
          mandatory: true,
        },
      ])
    );

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors[0]?.message).toBe(
      "Attribute 'default' must be one of the declared choice values"
    );
    expect(result.errors[0]?.path).toEqual(['configuration', 0, 'default']);
  });

  it('rejects unrecognized field attributes', () => {
    const result = validateDescriptor(
      withFields([{ label: 'Server', key: 'server', type: 'text', mandatory: true, placeholder: 'x' }])
    );

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors[0]?.message).toBe('Unrecognized attribute(s): placeholder');
    expect(result.errors[0]?.path).toEqual(['configuration', 0]);
  });

  it('reserves __proto__ as a field key and descriptor id', () => {
    const field = validateDescriptor(
      withFields([{ label: 'Proto', key: '__proto__', type: 'text', mandatory: false }])
    );
    expect(field.valid).toBe(false);
    if (!field.valid) {
      expect(field.errors[0]?.message).toBe("Attribute 'key' must not be '__proto__'");
      expect(field.errors[0]?.path).toEqual(['configuration', 0, 'key']);
    }

    const id = validateDescriptor({ ...sampleDescriptor(), id: '__proto__' });
    expect(id.valid).toBe(false);
    if (!id.valid) {
      expect(id.errors[0]?.message).toBe("Attribute 'id' must not be '__proto__'");
    }
  });

  it('rejects non-object input', () => {
    const result = validateDescriptor(['not', 'a', 'descriptor']);

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors[0]?.message).toBe('Descriptor must be a JSON object');
  });
});

describe('parseDescriptor', () => {
  it('reports malformed JSON as a schema error', () => {
    const err = captureError(() => parseDescriptor('{"name": '));

    expect(err).toBeInstanceOf(SchemaError);
    if (err instanceof SchemaError) {
      expect(err.message.startsWith('Descriptor is not valid JSON:')).toBe(true);
    }
  });

  it('strips a UTF-8 byte order mark', () => {
    const descriptor = parseDescriptor(`\uFEFF${JSON.stringify(sampleDescriptor())}`);

    expect(descriptor.version).toBe('1.2.0');
  });

  it('round-trips through serializeDescriptor', () => {
    const descriptor = loadDescriptor(sampleDescriptor());
    const serialized = serializeDescriptor(descriptor);
    const reparsed = parseDescriptor(serialized);

    expect(reparsed).toEqual(descriptor);
    expect(serializeDescriptor(reparsed)).toBe(serialized);
  });

  it('serializes declared attributes in declaration order', () => {
    const descriptor = loadDescriptor({
      name: 'Minimal',
      id: 'minimal',
      version: '0.1.0',
      types: ['events'],
      configuration: [{ key: 'host', mandatory: true, type: 'text', label: 'Host' }],
    });

    expect(JSON.parse(serializeDescriptor(descriptor))).toEqual({
      name: 'Minimal',
      id: 'minimal',
      version: '0.1.0',
      types: ['events'],
      configuration: [{ label: 'Host', key: 'host', type: 'text', mandatory: true }],
    });
    expect(Object.keys(JSON.parse(serializeDescriptor(descriptor)).configuration[0])).toEqual([
      'label',
      'key',
      'type',
      'mandatory',
    ]);
  });
});

describe('loadDescriptorFile', () => {
  it('reads a descriptor from disk', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'siemlink-core-'));
    try {
      const filePath = join(dir, 'descriptor.json');
      writeFileSync(filePath, JSON.stringify(sampleDescriptor()), 'utf-8');

      const descriptor = await loadDescriptorFile(filePath);
      expect(descriptor.name).toBe('Syslog Forwarder');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file as a schema error naming the path', async () => {
    const filePath = join(tmpdir(), 'siemlink-does-not-exist.json');

    await expect(loadDescriptorFile(filePath)).rejects.toThrow(
      `Failed to read descriptor file: ${filePath}`
    );
  });
});
