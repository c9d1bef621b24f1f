import type { ConfigurationField, ConnectorDescriptor } from '@siemlink/core';
import { loadDescriptor } from '@siemlink/core';
import { Logger } from '../src/index.js';

export function syslogDescriptor(
  version: string,
  configuration: ConfigurationField[]
): ConnectorDescriptor {
  return loadDescriptor({
    name: 'Syslog Forwarder',
    id: 'syslog_cls',
    version,
    types: ['events'],
    configuration,
  });
}

export const syslogV1 = (): ConnectorDescriptor =>
  syslogDescriptor('1.0.0', [
    { label: 'Server', key: 'server', type: 'text', mandatory: true },
    { label: 'Legacy Flag', key: 'legacy_flag', type: 'text', mandatory: false },
  ]);

export const syslogV2 = (): ConnectorDescriptor =>
  syslogDescriptor('2.0.0', [
    { label: 'Server', key: 'server', type: 'text', mandatory: true },
    {
      label: 'Region',
      key: 'region',
      type: 'choice',
      choices: [
        { key: 'Europe', value: 'eu' },
        { key: 'United States', value: 'us' },
      ],
      mandatory: true,
    },
  ]);

/** Logger that keeps its output for assertions */
export function capturingLogger(level: 'debug' | 'info' | 'warn' | 'error' = 'debug'): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = new Logger({ level, format: 'json', sink: (line) => lines.push(line) });
  return { logger, lines };
}

/** Clock that advances one second per call */
export function steppingClock(start = '2024-05-01T10:00:00.000Z'): () => Date {
  let now = Date.parse(start);
  return () => {
    const current = new Date(now);
    now += 1000;
    return current;
  };
}
