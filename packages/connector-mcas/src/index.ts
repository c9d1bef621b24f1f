/**
 * @siemlink/connector-mcas
 *
 * Log-forwarding connector descriptor for Microsoft Defender for Cloud Apps
 */

import type { ConnectorPlugin } from '@siemlink/core';
import { loadMcasDescriptor } from './descriptor.js';
import { validateMcasConfiguration } from './validator.js';

export { MCAS_CONNECTOR_ID, loadMcasDescriptor, readMcasManifest } from './descriptor.js';
export { validateMcasConfiguration } from './validator.js';

export function createMcasPlugin(): ConnectorPlugin {
  return {
    descriptor: loadMcasDescriptor(),
    check: validateMcasConfiguration,
  };
}
