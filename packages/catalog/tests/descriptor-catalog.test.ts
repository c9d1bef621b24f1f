import { describe, expect, it } from 'vitest';
import { DescriptorError, SchemaError, serializeDescriptor } from '@siemlink/core';
import { createMcasPlugin, validateMcasConfiguration } from '@siemlink/connector-mcas';
import { DescriptorCatalog } from '../src/index.js';
import { capturingLogger, syslogDescriptor, syslogV1 } from './fixtures.js';

function newCatalog(): DescriptorCatalog {
  return new DescriptorCatalog({ logger: capturingLogger('error').logger });
}

describe('DescriptorCatalog', () => {
  it('registers a plugin together with its check', () => {
    const catalog = newCatalog();
    const descriptor = catalog.register(createMcasPlugin());

    expect(descriptor.id).toBe('mcas_cls');
    expect(catalog.size).toBe(1);
    expect(catalog.get('mcas_cls', '1.0.0')).toBe(descriptor);
    expect(catalog.checkFor('mcas_cls')).toBe(validateMcasConfiguration);
  });

  it('treats identical re-registration as a no-op', () => {
    const catalog = newCatalog();
    const first = catalog.register(syslogV1());
    const second = catalog.register(syslogV1());

    expect(second).toBe(first);
    expect(catalog.size).toBe(1);
  });

  it('refuses different content under a registered version', () => {
    const catalog = newCatalog();
    catalog.register(syslogV1());

    let caught: unknown;
    try {
      catalog.register(
        syslogDescriptor('1.0.0', [{ label: 'Host', key: 'host', type: 'text', mandatory: true }])
      );
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DescriptorError);
    if (caught instanceof DescriptorError) {
      expect(caught.code).toBe('DESCRIPTOR_CONFLICT');
      expect(caught.message).toBe(
        'Descriptor syslog_cls@1.0.0 is already registered with different content'
      );
    }
    expect(catalog.get('syslog_cls')?.configuration[0]?.key).toBe('server');
  });

  it('resolves the latest version by semver precedence', () => {
    const catalog = newCatalog();
    catalog.register(syslogDescriptor('1.2.0', [{ label: 'Server', key: 'server', type: 'text', mandatory: true }]));
    catalog.register(syslogDescriptor('1.10.0', [{ label: 'Server', key: 'server', type: 'text', mandatory: true }]));
    catalog.register(syslogDescriptor('1.10.0-rc.1', [{ label: 'Server', key: 'server', type: 'text', mandatory: true }]));

    expect(catalog.versions('syslog_cls')).toEqual(['1.2.0', '1.10.0-rc.1', '1.10.0']);
    expect(catalog.get('syslog_cls')?.version).toBe('1.10.0');
    expect(catalog.get('syslog_cls', '1.2.0')?.version).toBe('1.2.0');
    expect(catalog.get('syslog_cls', '3.0.0')).toBeUndefined();
  });

  it('lists the latest revision of each connector', () => {
    const catalog = newCatalog();
    catalog.register(createMcasPlugin());
    catalog.register(syslogV1());

    expect(catalog.ids()).toEqual(['mcas_cls', 'syslog_cls']);
    expect(catalog.list()).toEqual([
      {
        id: 'mcas_cls',
        name: 'Microsoft Defender for Cloud Apps',
        version: '1.0.0',
        types: ['events'],
        versions: ['1.0.0'],
      },
      {
        id: 'syslog_cls',
        name: 'Syslog Forwarder',
        version: '1.0.0',
        types: ['events'],
        versions: ['1.0.0'],
      },
    ]);
  });

  it('names registered versions when a lookup misses', () => {
    const catalog = newCatalog();
    catalog.register(syslogV1());

    let caught: unknown;
    try {
      catalog.getOrThrow('syslog_cls', '9.9.9');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DescriptorError);
    if (caught instanceof DescriptorError) {
      expect(caught.code).toBe('NOT_FOUND');
      expect(caught.message).toBe("Descriptor 'syslog_cls@9.9.9' is not registered");
      expect(caught.suggestion).toBe('Registered versions: 1.0.0');
    }
  });

  it('registers serialized descriptors', () => {
    const catalog = newCatalog();
    const descriptor = catalog.registerSource(serializeDescriptor(syslogV1()));

    expect(descriptor.version).toBe('1.0.0');
    expect(catalog.size).toBe(1);
  });

  it('stores nothing when a serialized descriptor is invalid', () => {
    const catalog = newCatalog();

    expect(() => catalog.registerSource('{"name": "Broken"')).toThrow(SchemaError);
    expect(() =>
      catalog.registerSource(JSON.stringify({ name: 'No id', version: '1.0.0', types: ['events'], configuration: [] }))
    ).toThrow("Missing required attribute 'id'");
    expect(catalog.size).toBe(0);
  });
});
