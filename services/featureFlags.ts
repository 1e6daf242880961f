/**
 * Feature flags
 *
 * A flag is read from the `feature_<NAME>` storage entry ('true' / 'false'),
 * falling back to the default passed in (usually from env config).
 * Changes take effect on the next page load.
 */

import type { StorageAdapter } from './storageAdapter';
import { errorMessage } from './errors';

export type FeatureName = 'COMPRESS_SAVED_LOOKS' | 'DEBUG_LOGS';

export type FeatureSet = Record<FeatureName, boolean>;

const flagKey = (name: FeatureName) => `feature_${name}`;

export function getFlag(storage: StorageAdapter, name: FeatureName, defaultValue: boolean): boolean {
  try {
    const stored = storage.getItem(flagKey(name));
    if (stored !== null) {
      return stored === 'true';
    }
  } catch (error) {
    console.warn(`[FeatureFlag] cannot read ${name}:`, errorMessage(error));
  }
  return defaultValue;
}

export function setFeatureFlag(storage: StorageAdapter, name: FeatureName, value: boolean): void {
  try {
    storage.setItem(flagKey(name), String(value));
    console.log(`[FeatureFlag] ${name} = ${value}`);
  } catch (error) {
    console.warn(`[FeatureFlag] cannot save ${name}:`, errorMessage(error));
  }
}

export function loadFeatures(storage: StorageAdapter, defaults: Partial<FeatureSet> = {}): FeatureSet {
  return {
    // 🟢 stable
    COMPRESS_SAVED_LOOKS: getFlag(storage, 'COMPRESS_SAVED_LOOKS', defaults.COMPRESS_SAVED_LOOKS ?? true),

    // 🔧 diagnostics
    DEBUG_LOGS: getFlag(storage, 'DEBUG_LOGS', defaults.DEBUG_LOGS ?? false),
  };
}
