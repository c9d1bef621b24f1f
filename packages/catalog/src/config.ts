import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { formatZodError } from '@siemlink/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const memoryStoreSchema = z
  .object({
    kind: z.literal('memory'),
  })
  .strict();

const fileStoreSchema = z
  .object({
    kind: z.literal('file'),
    dir: z.string().min(1),
    /** Environment variable holding the secret used to encrypt password values */
    secretKeyEnv: z.string().min(1),
  })
  .strict();

export const storeSchema = z.discriminatedUnion('kind', [memoryStoreSchema, fileStoreSchema]);

export type StoreConfig = z.infer<typeof storeSchema>;

export const hostConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    /** Extra descriptor files, relative to the config file */
    descriptors: z.array(z.string().min(1)).optional(),
    /** Register the bundled connectors (default true) */
    builtins: z.boolean().optional(),
    store: storeSchema.optional(),
    audit: z
      .object({
        enabled: z.boolean().optional(),
        logDir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type HostConfig = z.infer<typeof hostConfigSchema>;

/**
 * Validate an already-parsed config value. Relative paths are resolved
 * against `baseDir`.
 * @throws ConfigError
 */
export function parseHostConfig(
  value: unknown,
  baseDir: string = process.cwd(),
  options?: EnvExpansionOptions
): HostConfig {
  const expanded = expandEnvVars(value, options);
  const result = hostConfigSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError('Invalid host config', result.error));
  }

  const config = result.data;
  return {
    ...config,
    descriptors: config.descriptors?.map((p) => resolve(baseDir, p)),
    store:
      config.store?.kind === 'file'
        ? { ...config.store, dir: resolve(baseDir, config.store.dir) }
        : config.store,
    audit: config.audit?.logDir
      ? { ...config.audit, logDir: resolve(baseDir, config.audit.logDir) }
      : config.audit,
  };
}

/**
 * @throws ConfigError
 */
export async function loadHostConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<HostConfig> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read config file ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseHostConfig(parsed, dirname(absolutePath), options);
}
