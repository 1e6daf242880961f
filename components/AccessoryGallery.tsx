/**
 * Accessory gallery: category buttons + accessories of the active category
 */

import React, { useState } from 'react';
import type { AccessorySelection } from '../types/look';
import type { AccessoryCatalog } from '../services/accessoryCatalog';
import { isSelected } from '../services/accessorySelection';
import { fallbackTo } from '../utils/imageFallback';

export const PLACEHOLDER_ACCESSORY_IMAGE = 'assets/images/placeholder-accessory.svg';

const showPlaceholder = fallbackTo(PLACEHOLDER_ACCESSORY_IMAGE);

interface AccessoryGalleryProps {
  catalog: AccessoryCatalog;
  selection: AccessorySelection;
  onSelect: (categoryId: string, accessoryId: string) => void;
}

export const AccessoryGallery: React.FC<AccessoryGalleryProps> = ({ catalog, selection, onSelect }) => {
  const categories = catalog.getCategories();
  const [activeCategory, setActiveCategory] = useState(categories[0]?.id ?? '');
  const accessories = catalog.getAccessoriesByCategory(activeCategory);

  return (
    <div className="accessory-gallery">
      <div className="flex gap-2 mb-4" role="tablist">
        {categories.map(category => (
          <button
            key={category.id}
            type="button"
            role="tab"
            aria-selected={category.id === activeCategory}
            data-category={category.id}
            onClick={() => setActiveCategory(category.id)}
            className={`category-btn px-3 py-1.5 rounded-md text-sm transition-all ${
              category.id === activeCategory
                ? 'active bg-[var(--color-primary)] text-white'
                : 'bg-[var(--color-surface)] text-[var(--color-text-secondary)]'
            }`}
          >
            {category.icon} {category.name}
          </button>
        ))}
      </div>

      {accessories.length === 0 ? (
        <div className="empty-gallery text-center text-[var(--color-text-tertiary)]">
          <p>No accessories available for this category</p>
        </div>
      ) : (
        <div className="gallery-items grid grid-cols-2 md:grid-cols-4 gap-3">
          {accessories.map(accessory => {
            const active = isSelected(selection, activeCategory, accessory.id);
            return (
              <button
                key={accessory.id}
                type="button"
                aria-pressed={active}
                data-id={accessory.id}
                onClick={() => onSelect(activeCategory, accessory.id)}
                className={`gallery-item rounded-lg border p-2 ${
                  active ? 'active border-[var(--color-primary)]' : 'border-[var(--color-border)]'
                }`}
              >
                <img
                  src={accessory.thumbnail || PLACEHOLDER_ACCESSORY_IMAGE}
                  alt={accessory.name}
                  onError={showPlaceholder}
                />
                <div className="gallery-item-info text-xs mt-1">
                  <span>{accessory.name}</span>
                </div>
              </button>
            );
          })}
        </div>
      )}
    </div>
  );
};
