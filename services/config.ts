/**
 * App configuration from Vite env vars
 */

export interface AppConfig {
  storagePrefix: string;
  compressSavedLooks: boolean;
}

export interface StorageKeys {
  savedLooks: string;
  theme: string;
  currentAvatar: string;
  currentLook: string;
}

const DEFAULT_PREFIX = 'tryon';

type EnvLike = Record<string, string | boolean | undefined>;

export function readConfig(env: EnvLike = import.meta.env): AppConfig {
  const prefix = typeof env.VITE_LOOKS_STORAGE_PREFIX === 'string'
    ? env.VITE_LOOKS_STORAGE_PREFIX.trim()
    : '';
  const compress = env.VITE_LOOKS_COMPRESS;

  return {
    storagePrefix: prefix || DEFAULT_PREFIX,
    compressSavedLooks: !(compress === false || compress === 'false' || compress === '0'),
  };
}

export function storageKeys(prefix: string): StorageKeys {
  return {
    savedLooks: `${prefix}-saved-looks`,
    theme: `${prefix}-theme`,
    currentAvatar: `${prefix}-current-avatar`,
    currentLook: `${prefix}-current-look`,
  };
}
