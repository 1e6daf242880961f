/**
 * Saved looks grid
 * Shows an empty state when there are no looks at all and a no-results state when the
 * search filters everything out.
 */

import React from 'react';
import type { LookRecord } from '../types/look';
import { LookCard } from './LookCard';

interface LooksGridProps {
  looks: LookRecord[];
  totalCount: number;
  query: string;
  onView: (id: string) => void;
  onDelete: (id: string) => void;
  confirmDelete?: (look: LookRecord) => boolean;
}

export function LooksGrid({
  looks,
  totalCount,
  query,
  onView,
  onDelete,
  confirmDelete,
}: LooksGridProps) {
  if (totalCount === 0) {
    return (
      <div className="no-looks-message text-center mt-10 text-[var(--color-text-tertiary)]">
        <p>No saved looks yet. Pick some accessories and press "Save Look".</p>
      </div>
    );
  }

  if (looks.length === 0) {
    return (
      <div className="no-results text-center mt-10 text-[var(--color-text-tertiary)]">
        <span className="text-3xl">🔍</span>
        <p>No looks matching "{query.trim()}" found</p>
      </div>
    );
  }

  return (
    <div className="looks-grid grid grid-cols-1 md:grid-cols-2 lg:grid-cols-3 gap-6">
      {looks.map(look => (
        <LookCard
          key={look.id}
          look={look}
          onView={onView}
          onDelete={onDelete}
          confirmDelete={confirmDelete}
        />
      ))}
    </div>
  );
}
