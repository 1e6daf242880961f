/**
 * Session state
 * Theme preference, current avatar and the working (unsaved) look, kept between page loads.
 * Writes are best-effort: a storage failure is logged, never thrown.
 */

import { z } from 'zod';
import type { AccessorySelection, CurrentLookState, LookRecord, Theme } from '../types/look';
import { storageKeys, type StorageKeys } from './config';
import { errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import type { StorageAdapter } from './storageAdapter';

const currentLookSchema = z.object({
  avatar: z.string().nullable(),
  accessories: z.record(z.string(), z.string()),
  timestamp: z.string(),
});

export interface SessionStateOptions {
  storage: StorageAdapter;
  keys?: StorageKeys;
  logger?: Logger;
  now?: () => Date;
}

export class SessionState {
  private readonly storage: StorageAdapter;
  private readonly keys: StorageKeys;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SessionStateOptions) {
    this.storage = options.storage;
    this.keys = options.keys ?? storageKeys('tryon');
    this.logger = options.logger ?? createLogger('Session');
    this.now = options.now ?? (() => new Date());
  }

  private read(key: string): string | null {
    try {
      return this.storage.getItem(key);
    } catch (error) {
      this.logger.warn(`Cannot read ${key}:`, errorMessage(error));
      return null;
    }
  }

  private write(key: string, value: string | null): boolean {
    try {
      if (value === null) {
        this.storage.removeItem(key);
      } else {
        this.storage.setItem(key, value);
      }
      return true;
    } catch (error) {
      this.logger.warn(`Cannot write ${key}:`, errorMessage(error));
      return false;
    }
  }

  // ---------- theme ----------

  getTheme(): Theme {
    return this.read(this.keys.theme) === 'dark' ? 'dark' : 'light';
  }

  setTheme(theme: Theme): boolean {
    return this.write(this.keys.theme, theme);
  }

  // ---------- current avatar ----------

  getCurrentAvatar(): string | null {
    return this.read(this.keys.currentAvatar) || null;
  }

  setCurrentAvatar(reference: string): boolean {
    return this.write(this.keys.currentAvatar, reference);
  }

  clearCurrentAvatar(): boolean {
    return this.write(this.keys.currentAvatar, null);
  }

  // ---------- working look ----------

  saveCurrentLook(look: { avatar: string | null; accessories: AccessorySelection }): boolean {
    const state: CurrentLookState = {
      avatar: look.avatar,
      accessories: { ...look.accessories },
      timestamp: this.now().toISOString(),
    };
    return this.write(this.keys.currentLook, JSON.stringify(state));
  }

  loadCurrentLook(): CurrentLookState | undefined {
    const raw = this.read(this.keys.currentLook);
    if (!raw) return undefined;

    try {
      const parsed = currentLookSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      this.logger.warn('Ignoring invalid current look entry');
    } catch (error) {
      this.logger.warn('Ignoring unreadable current look entry:', errorMessage(error));
    }
    return undefined;
  }

  /**
   * Makes a saved look the working one: its preview becomes the current avatar and
   * a copy of its selection is returned for the caller to apply.
   */
  applyLook(record: LookRecord): AccessorySelection {
    const accessories = { ...record.accessorySelection };
    const avatar = record.previewReference ?? this.getCurrentAvatar();
    if (record.previewReference) {
      this.setCurrentAvatar(record.previewReference);
    }
    this.saveCurrentLook({ avatar, accessories });
    return accessories;
  }
}
