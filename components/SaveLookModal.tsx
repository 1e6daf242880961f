/**
 * Save look modal
 * Collects name + notes; the parent performs the save and returns an error message on failure.
 */

import React, { useEffect, useState } from 'react';

interface SaveLookModalProps {
  isOpen: boolean;
  onClose: () => void;
  /** Returns an error message to show, or null when the look was saved */
  onSave: (name: string, notes: string) => string | null;
  canSave?: boolean;
}

export const SaveLookModal: React.FC<SaveLookModalProps> = ({
  isOpen,
  onClose,
  onSave,
  canSave = true,
}) => {
  const [name, setName] = useState('');
  const [notes, setNotes] = useState('');
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (!isOpen) {
      setName('');
      setNotes('');
      setError(null);
    }
  }, [isOpen]);

  if (!isOpen) return null;

  const handleSubmit = (event: React.FormEvent) => {
    event.preventDefault();
    if (!canSave) {
      setError('Please create an avatar first');
      return;
    }
    const message = onSave(name, notes);
    if (message) {
      setError(message);
      return;
    }
    onClose();
  };

  return (
    <div className="modal active fixed inset-0 bg-black/60 flex items-center justify-center z-50" role="dialog" aria-label="Save look">
      <form
        onSubmit={handleSubmit}
        className="bg-[var(--color-surface-solid)] p-6 rounded-lg border border-[var(--color-border)] w-full max-w-md"
      >
        <h2 className="text-xl font-bold text-[var(--color-text)] mb-4">💾 Save Look</h2>

        <label className="block text-sm mb-1" htmlFor="look-name">Look name</label>
        <input
          id="look-name"
          value={name}
          onChange={e => setName(e.target.value)}
          className="w-full px-3 py-2 rounded-md bg-[var(--color-surface)] border border-[var(--color-border)] mb-3"
          autoFocus
        />

        <label className="block text-sm mb-1" htmlFor="look-notes">Notes</label>
        <textarea
          id="look-notes"
          value={notes}
          onChange={e => setNotes(e.target.value)}
          rows={3}
          className="w-full px-3 py-2 rounded-md bg-[var(--color-surface)] border border-[var(--color-border)]"
        />

        {error && (
          <div role="alert" className="mt-3 p-3 rounded-md text-xs bg-red-900/30 border border-red-700 text-red-300">
            {error}
          </div>
        )}

        <div className="flex justify-end gap-2 mt-4">
          <button type="button" onClick={onClose} className="secondary-btn px-4 py-2 rounded-md text-sm">
            Cancel
          </button>
          <button type="submit" className="px-4 py-2 rounded-md text-sm bg-[var(--color-primary)] text-white">
            Save
          </button>
        </div>
      </form>
    </div>
  );
};
