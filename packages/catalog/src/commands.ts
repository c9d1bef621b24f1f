/**
 * CLI commands
 *
 * Usage:
 *   siemlink validate <descriptor.json>
 *   siemlink inputs <descriptor.json>
 *   siemlink activate --config <host.json> --tenant <id> --connector <id> --values <values.json> [--version <v>]
 *   siemlink export --config <host.json> --tenant <id> --connector <id>
 *   siemlink deactivate --config <host.json> --tenant <id> --connector <id>
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  DescriptorError,
  SchemaError,
  formatPath,
  requiredInputs,
  validateDescriptor,
  type DescriptorValidationResult,
} from '@siemlink/core';
import { ConfigError, loadHostConfig } from './config.js';
import { createHost, type Host } from './host.js';

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: NodeJS.ProcessEnv;
}

const USAGE = [
  'Usage:',
  '  siemlink validate <descriptor.json>',
  '  siemlink inputs <descriptor.json>',
  '  siemlink activate --config <host.json> --tenant <id> --connector <id> --values <values.json> [--version <v>]',
  '  siemlink export --config <host.json> --tenant <id> --connector <id>',
  '  siemlink deactivate --config <host.json> --tenant <id> --connector <id>',
].join('\n');

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function option(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  return index !== -1 ? args[index + 1] : undefined;
}

function requireOption(args: string[], name: string): string {
  const value = option(args, name);
  if (!value) throw new UsageError(`Missing --${name}`);
  return value;
}

async function readJson(filePath: string, label: string): Promise<unknown> {
  const absolutePath = resolve(process.cwd(), filePath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new SchemaError({
      message: `Failed to read ${label}: ${absolutePath}`,
      cause: err instanceof Error ? err : undefined,
    });
  }
  try {
    return JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new SchemaError({
      message: `${label} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    });
  }
}

async function validateFile(filePath: string): Promise<DescriptorValidationResult> {
  return validateDescriptor(await readJson(filePath, 'descriptor file'));
}

async function validateCommand(args: string[], io: CliIo): Promise<number> {
  const filePath = args[0];
  if (!filePath) throw new UsageError('Missing descriptor file');

  const result = await validateFile(filePath);
  if (!result.valid) {
    io.stderr(`Descriptor ${filePath} is invalid:`);
    for (const error of result.errors) {
      io.stderr(`- ${formatPath(error.path ?? [])}: ${error.message} [${error.code}]`);
    }
    return 1;
  }

  const { descriptor } = result;
  io.stdout(
    `OK ${descriptor.id}@${descriptor.version}: ${descriptor.configuration.length} configuration field(s)`
  );
  return 0;
}

async function inputsCommand(args: string[], io: CliIo): Promise<number> {
  const filePath = args[0];
  if (!filePath) throw new UsageError('Missing descriptor file');

  const result = await validateFile(filePath);
  if (!result.valid) {
    const [first] = result.errors;
    if (first) throw first;
    return 1;
  }
  for (const field of requiredInputs(result.descriptor)) {
    io.stdout(`${field.key}\t${field.type}\t${field.label}`);
  }
  return 0;
}

async function withHost(args: string[], io: CliIo, fn: (host: Host) => Promise<number>): Promise<number> {
  const config = await loadHostConfig(requireOption(args, 'config'), { env: io.env });
  const host = await createHost(config, { env: io.env, logSink: (line) => io.stderr(line.trimEnd()) });
  return fn(host);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function activateCommand(args: string[], io: CliIo): Promise<number> {
  const tenantId = requireOption(args, 'tenant');
  const connectorId = requireOption(args, 'connector');
  const values = await readJson(requireOption(args, 'values'), 'values file');
  if (!isPlainObject(values)) {
    throw new SchemaError({ message: 'values file must contain a JSON object' });
  }

  return withHost(args, io, async ({ service }) => {
    await service.activate(tenantId, connectorId, values, { version: option(args, 'version') });
    const exported = await service.export(tenantId, connectorId);
    io.stdout(JSON.stringify(exported, null, 2));
    return 0;
  });
}

async function exportCommand(args: string[], io: CliIo): Promise<number> {
  const tenantId = requireOption(args, 'tenant');
  const connectorId = requireOption(args, 'connector');
  return withHost(args, io, async ({ service }) => {
    io.stdout(JSON.stringify(await service.export(tenantId, connectorId), null, 2));
    return 0;
  });
}

async function deactivateCommand(args: string[], io: CliIo): Promise<number> {
  const tenantId = requireOption(args, 'tenant');
  const connectorId = requireOption(args, 'connector');
  return withHost(args, io, async ({ service }) => {
    await service.deactivate(tenantId, connectorId);
    io.stdout(`Deactivated ${connectorId} for tenant ${tenantId}`);
    return 0;
  });
}

/**
 * Run a CLI invocation; resolves to the process exit code.
 */
export async function runCli(args: string[], io: CliIo): Promise<number> {
  const [command, ...rest] = args;
  try {
    switch (command) {
      case 'validate':
        return await validateCommand(rest, io);
      case 'inputs':
        return await inputsCommand(rest, io);
      case 'activate':
        return await activateCommand(rest, io);
      case 'export':
        return await exportCommand(rest, io);
      case 'deactivate':
        return await deactivateCommand(rest, io);
      default:
        io.stderr(USAGE);
        return 2;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(err.message);
      io.stderr(USAGE);
      return 2;
    }
    if (err instanceof DescriptorError) {
      io.stderr(err.toActionableMessage());
      return 1;
    }
    if (err instanceof ConfigError) {
      io.stderr(err.message);
      return 1;
    }
    throw err;
  }
}
