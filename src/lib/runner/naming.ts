function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `<prefix>-<slot>-<base36 timestamp><random>`; doubles as the runner's registered name
 */
export function generateVmName(prefix: string, slotId: number, now: number = Date.now()): string {
  const timestamp = now.toString(36);
  const randomSuffix = Math.random().toString(36).substring(2, 6);
  return `${prefix}-${slotId}-${timestamp}${randomSuffix}`;
}

export function isManagedVmName(prefix: string, name: string): boolean {
  return new RegExp(`^${escapeRegExp(prefix)}-\\d+-[a-z0-9]+$`).test(name);
}

export function slotIdFromVmName(prefix: string, name: string): number | null {
  if (!isManagedVmName(prefix, name)) return null;
  const slot = name.slice(prefix.length + 1).split('-')[0];
  return slot === undefined ? null : Number.parseInt(slot, 10);
}
