/**
 * Currently selected accessories, one row per category
 */

import React from 'react';
import type { AccessorySelection } from '../types/look';
import type { AccessoryCatalog } from '../services/accessoryCatalog';

interface OutfitListProps {
  catalog: AccessoryCatalog;
  selection: AccessorySelection;
  onRemove: (categoryId: string) => void;
  onClear: () => void;
}

export function OutfitList({ catalog, selection, onRemove, onClear }: OutfitListProps) {
  const items = catalog.resolveSelection(selection);

  if (items.length === 0) {
    return <p className="text-sm text-[var(--color-text-tertiary)]">No accessories selected</p>;
  }

  return (
    <div>
      <ul className="outfit-list space-y-1">
        {items.map(({ category, accessory }) => (
          <li key={category.id} className="flex items-center justify-between text-sm">
            <span>{category.icon} {accessory.name}</span>
            <button
              type="button"
              aria-label={`Remove ${accessory.name}`}
              onClick={() => onRemove(category.id)}
              className="remove-accessory-btn w-6 h-6 rounded-full hover:text-[var(--color-accent-red)]"
            >
              ✕
            </button>
          </li>
        ))}
      </ul>
      <button type="button" onClick={onClear} className="secondary-btn mt-3 px-3 py-1 rounded-md text-sm">
        Clear all
      </button>
    </div>
  );
}
