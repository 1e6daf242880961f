import { describe, expect, it, vi } from 'vitest';
import { SessionState } from './sessionState';
import { createMemoryStorage, type StorageAdapter } from './storageAdapter';
import { storageKeys } from './config';
import { PersistenceError } from './errors';
import type { Logger } from './logger';

const now = () => new Date('2024-04-01T08:30:00.000Z');

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function makeSession(storage: StorageAdapter = createMemoryStorage(), logger: Logger = spyLogger()) {
  return new SessionState({ storage, keys: storageKeys('t'), logger, now });
}

describe('SessionState theme', () => {
  it('defaults to light and remembers dark', () => {
    const storage = createMemoryStorage();
    const session = makeSession(storage);

    expect(session.getTheme()).toBe('light');
    expect(session.setTheme('dark')).toBe(true);
    expect(session.getTheme()).toBe('dark');
    expect(storage.getItem('t-theme')).toBe('dark');
  });

  it('treats unknown stored values as light', () => {
    expect(makeSession(createMemoryStorage({ 't-theme': 'sepia' })).getTheme()).toBe('light');
  });
});

describe('SessionState avatar', () => {
  it('sets and clears the current avatar', () => {
    const session = makeSession();

    expect(session.getCurrentAvatar()).toBeNull();
    session.setCurrentAvatar('data:image/png;base64,AAAA');
    expect(session.getCurrentAvatar()).toBe('data:image/png;base64,AAAA');
    session.clearCurrentAvatar();
    expect(session.getCurrentAvatar()).toBeNull();
  });
});

describe('SessionState current look', () => {
  it('stamps and reloads the working look', () => {
    const storage = createMemoryStorage();
    const session = makeSession(storage);

    session.saveCurrentLook({ avatar: 'a.png', accessories: { shoes: 's1' } });

    expect(JSON.parse(storage.getItem('t-current-look') ?? '')).toEqual({
      avatar: 'a.png',
      accessories: { shoes: 's1' },
      timestamp: '2024-04-01T08:30:00.000Z',
    });
    expect(session.loadCurrentLook()).toEqual({
      avatar: 'a.png',
      accessories: { shoes: 's1' },
      timestamp: '2024-04-01T08:30:00.000Z',
    });
  });

  it('ignores a missing, unreadable or malformed entry', () => {
    const logger = spyLogger();
    expect(makeSession(createMemoryStorage(), logger).loadCurrentLook()).toBeUndefined();
    expect(makeSession(createMemoryStorage({ 't-current-look': '{oops' }), logger).loadCurrentLook()).toBeUndefined();
    expect(makeSession(createMemoryStorage({ 't-current-look': '{"avatar":3}' }), logger).loadCurrentLook()).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});

describe('SessionState.applyLook', () => {
  const look = {
    id: 'l1',
    name: 'Gala',
    notes: '',
    createdAt: '2024-01-01T00:00:00.000Z',
    previewReference: 'gala.png',
    accessorySelection: { jewelry: 'j3' },
  };

  it('makes the preview the current avatar and returns a copy of the selection', () => {
    const session = makeSession();

    const selection = session.applyLook(look);

    expect(selection).toEqual({ jewelry: 'j3' });
    expect(selection).not.toBe(look.accessorySelection);
    expect(session.getCurrentAvatar()).toBe('gala.png');
    expect(session.loadCurrentLook()?.accessories).toEqual({ jewelry: 'j3' });
  });

  it('keeps the current avatar for a look without a preview', () => {
    const session = makeSession();
    session.setCurrentAvatar('me.png');

    session.applyLook({ ...look, previewReference: undefined });

    expect(session.getCurrentAvatar()).toBe('me.png');
    expect(session.loadCurrentLook()?.avatar).toBe('me.png');
  });
});

describe('SessionState write failures', () => {
  it('logs a warning and reports false instead of throwing', () => {
    const logger = spyLogger();
    const storage: StorageAdapter = {
      getItem: () => null,
      setItem: () => { throw new PersistenceError('full', { quotaExceeded: true }); },
      removeItem: () => {},
    };
    const session = makeSession(storage, logger);

    expect(session.setTheme('dark')).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Cannot write t-theme:', 'full');
  });
});
