import type { Capability } from './types.js';

export const DRIVER_CAPABILITIES: readonly Capability[] = [
  'getVersion',
  'setVersion',
  'getClusterSize',
  'setClusterSize',
];

export function hasCapability(capability: Capability): boolean {
  return DRIVER_CAPABILITIES.includes(capability);
}
