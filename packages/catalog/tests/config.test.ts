import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { serializeDescriptor } from '@siemlink/core';
import {
  ConfigError,
  FileConfigurationStore,
  InMemoryConfigurationStore,
  createHost,
  expandEnvVars,
  loadHostConfig,
  parseHostConfig,
} from '../src/index.js';
import { syslogV1 } from './fixtures.js';

describe('expandEnvVars', () => {
  const env = { SIEMLINK_HOME: '/srv/siemlink', EMPTY: '' };

  it('expands variables in nested values', () => {
    expect(
      expandEnvVars({ dir: '${SIEMLINK_HOME}/state', list: ['${SIEMLINK_HOME}'], port: 514 }, { env })
    ).toEqual({ dir: '/srv/siemlink/state', list: ['/srv/siemlink'], port: 514 });
  });

  it('falls back to the default for unset or empty variables', () => {
    expect(expandEnvVars('${MISSING:-audit}', { env })).toBe('audit');
    expect(expandEnvVars('${EMPTY:-audit}', { env })).toBe('audit');
  });

  it('fails on a missing variable unless told otherwise', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(
      new ConfigError('Missing required environment variable: MISSING')
    );
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });
});

describe('parseHostConfig', () => {
  it('resolves paths against the base directory', () => {
    const config = parseHostConfig(
      {
        descriptors: ['descriptors/syslog.json'],
        store: { kind: 'file', dir: 'state', secretKeyEnv: 'SIEMLINK_SECRET' },
        audit: { enabled: true, logDir: '${AUDIT_DIR:-audit}' },
        logging: { level: 'warn', format: 'json' },
      },
      '/etc/siemlink',
      { env: {} }
    );

    expect(config).toEqual({
      descriptors: ['/etc/siemlink/descriptors/syslog.json'],
      store: { kind: 'file', dir: '/etc/siemlink/state', secretKeyEnv: 'SIEMLINK_SECRET' },
      audit: { enabled: true, logDir: '/etc/siemlink/audit' },
      logging: { level: 'warn', format: 'json' },
    });
  });

  it('rejects unknown keys', () => {
    expect(() => parseHostConfig({ stores: {} }, '/etc/siemlink', { env: {} })).toThrow(ConfigError);
    expect(() => parseHostConfig({ stores: {} }, '/etc/siemlink', { env: {} })).toThrow(
      /^Invalid host config:\n- \(root\): Unrecognized key\(s\) in object: 'stores'$/
    );
  });

  it('rejects an unknown store kind', () => {
    expect(() => parseHostConfig({ store: { kind: 'redis' } }, '/etc/siemlink', { env: {} })).toThrow(
      /^Invalid host config:\n- store\.kind: /
    );
  });
});

describe('loadHostConfig and createHost', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'siemlink-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a config file with a byte order mark', async () => {
    const configPath = join(dir, 'host.json');
    writeFileSync(configPath, `\uFEFF${JSON.stringify({ descriptors: ['syslog.json'] })}`);

    const config = await loadHostConfig(configPath, { env: {} });

    expect(config.descriptors).toEqual([join(dir, 'syslog.json')]);
  });

  it('reports unreadable and malformed files', async () => {
    await expect(loadHostConfig(join(dir, 'missing.json'))).rejects.toThrow(ConfigError);

    const configPath = join(dir, 'host.json');
    writeFileSync(configPath, '{ not json');
    await expect(loadHostConfig(configPath)).rejects.toThrow(
      `Config file ${configPath} is not valid JSON`
    );
  });

  it('registers the bundled connector and extra descriptor files', async () => {
    const descriptorPath = join(dir, 'syslog.json');
    writeFileSync(descriptorPath, serializeDescriptor(syslogV1()));

    const host = await createHost(
      { descriptors: [descriptorPath], logging: { level: 'error' } },
      { logSink: () => undefined }
    );

    expect(host.catalog.ids()).toEqual(['mcas_cls', 'syslog_cls']);
    expect(host.store).toBeInstanceOf(InMemoryConfigurationStore);
    expect(host.audit).toBeUndefined();
  });

  it('can leave the bundled connector out', async () => {
    const host = await createHost({ builtins: false }, { logSink: () => undefined });

    expect(host.catalog.size).toBe(0);
  });

  it('aborts startup on an invalid descriptor file', async () => {
    const descriptorPath = join(dir, 'broken.json');
    writeFileSync(descriptorPath, JSON.stringify({ name: 'Broken' }));
    const lines: string[] = [];

    await expect(
      createHost({ descriptors: [descriptorPath] }, { logSink: (line) => lines.push(line) })
    ).rejects.toMatchObject({ code: 'SCHEMA_ERROR' });
    expect(lines.at(-1)).toContain('ERROR Failed to register descriptor');
  });

  it('requires the store secret for a file store', async () => {
    await expect(
      createHost(
        { store: { kind: 'file', dir, secretKeyEnv: 'SIEMLINK_SECRET' } },
        { env: {}, logSink: () => undefined }
      )
    ).rejects.toThrow(new ConfigError('Missing required environment variable: SIEMLINK_SECRET'));

    const host = await createHost(
      { store: { kind: 'file', dir, secretKeyEnv: 'SIEMLINK_SECRET' }, audit: { enabled: true } },
      { env: { SIEMLINK_SECRET: 'store-secret' }, logSink: () => undefined }
    );
    expect(host.store).toBeInstanceOf(FileConfigurationStore);
    expect(host.audit).toBeDefined();
  });
});
