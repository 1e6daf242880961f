import { useCallback, useEffect, useState } from 'react';
import type { AccessorySelection } from '../../types/look';
import {
  clearAccessories,
  removeAccessory,
  selectAccessory,
} from '../../services/accessorySelection';
import type { SessionState } from '../../services/sessionState';

/**
 * Current avatar + accessory selection, restored from and mirrored into the session.
 */
export function useAccessorySelection(session: SessionState) {
  const [selection, setSelection] = useState<AccessorySelection>(
    () => session.loadCurrentLook()?.accessories ?? {}
  );
  const [avatar, setAvatarState] = useState<string | null>(() => session.getCurrentAvatar());

  useEffect(() => {
    session.saveCurrentLook({ avatar, accessories: selection });
  }, [session, avatar, selection]);

  const select = useCallback((categoryId: string, accessoryId: string) => {
    setSelection(prev => selectAccessory(prev, categoryId, accessoryId));
  }, []);

  const remove = useCallback((categoryId: string) => {
    setSelection(prev => removeAccessory(prev, categoryId));
  }, []);

  const clear = useCallback(() => {
    setSelection(clearAccessories());
  }, []);

  const setAvatar = useCallback((reference: string | null) => {
    if (reference) {
      session.setCurrentAvatar(reference);
    } else {
      session.clearCurrentAvatar();
    }
    setAvatarState(reference);
  }, [session]);

  /**
   * Replace the working state with a saved look
   */
  const applySelection = useCallback((next: AccessorySelection, nextAvatar?: string | null) => {
    setSelection({ ...next });
    if (nextAvatar !== undefined) {
      setAvatarState(nextAvatar);
    }
  }, []);

  return {
    selection,
    avatar,
    select,
    remove,
    clear,
    setAvatar,
    applySelection,
  };
}
