import { readFileSync } from 'node:fs';
import type { ConnectorDescriptor } from '@siemlink/core';
import { parseDescriptor } from '@siemlink/core';

export const MCAS_CONNECTOR_ID = 'mcas_cls';

const manifestUrl = new URL('../manifest.json', import.meta.url);

let cached: ConnectorDescriptor | undefined;

/**
 * Load the bundled Defender for Cloud Apps descriptor.
 * The manifest is read and validated once per process.
 * @throws DescriptorError if the bundled manifest is invalid
 */
export function loadMcasDescriptor(): ConnectorDescriptor {
  if (!cached) {
    cached = parseDescriptor(readFileSync(manifestUrl, 'utf-8'));
  }
  return cached;
}

/** Raw manifest text, as shipped */
export function readMcasManifest(): string {
  return readFileSync(manifestUrl, 'utf-8');
}
