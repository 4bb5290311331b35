import { PLATFORMS } from '../config/sync-target.js';
import type { Platform, SyncTarget } from '../config/sync-target.js';
import { ConfigurationError } from '../raw/errors.js';

export function parsePlatform(value: string | undefined): Platform | undefined {
  if (value === undefined || value === '') return undefined;
  const platform = PLATFORMS.find((p) => p === value);
  if (!platform) {
    throw new ConfigurationError(`Unknown platform "${value}", expected one of: ${PLATFORMS.join(', ')}`);
  }
  return platform;
}

/** Narrows the target list to one platform; an empty result is a configuration error. */
export function selectTargets(targets: readonly SyncTarget[], platform?: Platform): SyncTarget[] {
  const selected = platform ? targets.filter((t) => t.platform === platform) : [...targets];
  if (selected.length === 0) {
    throw new ConfigurationError(platform ? `No ${platform} targets configured` : 'No sync targets configured');
  }
  return selected;
}
