/**
 * Saved look card
 */

import React from 'react';
import type { LookRecord } from '../types/look';
import { fallbackTo } from '../utils/imageFallback';

export const PLACEHOLDER_LOOK_IMAGE = 'assets/images/placeholder-look.svg';

const showPlaceholder = fallbackTo(PLACEHOLDER_LOOK_IMAGE);

export function formatLookDate(iso: string, locale = 'en-US'): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return '';
  return date.toLocaleDateString(locale, {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
  });
}

interface LookCardProps {
  look: LookRecord;
  onView: (id: string) => void;
  onDelete: (id: string) => void;
  confirmDelete?: (look: LookRecord) => boolean;
}

const defaultConfirm = (look: LookRecord) =>
  window.confirm(`Delete the look "${look.name}"? This cannot be undone.`);

export const LookCard: React.FC<LookCardProps> = ({
  look,
  onView,
  onDelete,
  confirmDelete = defaultConfirm,
}) => {
  return (
    <div className="look-card glass-card rounded-xl overflow-hidden" data-id={look.id}>
      <img
        src={look.previewReference || PLACEHOLDER_LOOK_IMAGE}
        alt={look.name}
        onError={showPlaceholder}
        className="look-image w-full h-48 object-cover"
      />
      <div className="look-info p-4">
        <h4 className="font-bold text-[var(--color-text)] truncate">{look.name}</h4>
        <div className="look-date text-xs text-[var(--color-text-tertiary)]">
          {formatLookDate(look.createdAt)}
        </div>
        {look.notes && (
          <p className="text-sm text-[var(--color-text-secondary)] mt-2">{look.notes}</p>
        )}
        <div className="look-actions flex gap-2 mt-3">
          <button
            type="button"
            className="secondary-btn px-3 py-1 rounded-md text-sm"
            onClick={() => onView(look.id)}
          >
            👁️ View
          </button>
          <button
            type="button"
            className="secondary-btn px-3 py-1 rounded-md text-sm hover:text-[var(--color-accent-red)]"
            onClick={() => {
              if (confirmDelete(look)) {
                onDelete(look.id);
              }
            }}
          >
            🗑️ Delete
          </button>
        </div>
      </div>
    </div>
  );
};
