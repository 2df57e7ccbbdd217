import type { Toggle } from './types.js';

export function toggleFrom(value: boolean | null | undefined): Toggle {
  if (value === true) return 'enabled';
  if (value === false) return 'disabled';
  return 'inherit';
}

/** Only an explicit `disabled` switches a feature off */
export function isDisabled(toggle: Toggle): boolean {
  return toggle === 'disabled';
}
