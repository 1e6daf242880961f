/**
 * Wires config, feature flags, storage and the stores together.
 * The returned services are handed to <App> as props; nothing is stored on window.
 */

import { loadDefaultCatalog, type AccessoryCatalog } from './accessoryCatalog';
import { readConfig, storageKeys, type AppConfig } from './config';
import { loadFeatures, setFeatureFlag, type FeatureName, type FeatureSet } from './featureFlags';
import { createLogger } from './logger';
import { LookStore } from './lookStore';
import { SessionState } from './sessionState';
import { createDefaultStorage, type StorageAdapter } from './storageAdapter';

export interface AppServices {
  config: AppConfig;
  features: FeatureSet;
  looks: LookStore;
  session: SessionState;
  catalog: AccessoryCatalog;
  /** Stores a flag override; read again on the next page load */
  setFeature: (name: FeatureName, value: boolean) => void;
}

export interface AppServicesOptions {
  storage?: StorageAdapter;
  env?: Parameters<typeof readConfig>[0];
  now?: () => Date;
}

export function createAppServices(options: AppServicesOptions = {}): AppServices {
  const storage = options.storage ?? createDefaultStorage();
  const config = readConfig(options.env);
  const features = loadFeatures(storage, { COMPRESS_SAVED_LOOKS: config.compressSavedLooks });
  const keys = storageKeys(config.storagePrefix);
  const debug = features.DEBUG_LOGS;

  const looks = new LookStore({
    storage,
    key: keys.savedLooks,
    compress: features.COMPRESS_SAVED_LOOKS,
    logger: createLogger('LookStore', { debug }),
    now: options.now,
  });

  const session = new SessionState({
    storage,
    keys,
    logger: createLogger('Session', { debug }),
    now: options.now,
  });

  return {
    config,
    features,
    looks,
    session,
    catalog: loadDefaultCatalog(),
    setFeature: (name, value) => setFeatureFlag(storage, name, value),
  };
}
