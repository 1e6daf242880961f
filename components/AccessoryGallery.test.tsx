import { describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import { AccessoryGallery, PLACEHOLDER_ACCESSORY_IMAGE } from './AccessoryGallery';
import { AccessoryCatalog, loadDefaultCatalog } from '../services/accessoryCatalog';

describe('AccessoryGallery', () => {
  const catalog = loadDefaultCatalog();

  it('opens on the first category', () => {
    render(<AccessoryGallery catalog={catalog} selection={{}} onSelect={vi.fn()} />);

    expect(screen.getByRole('tab', { selected: true }).textContent).toBe('👕 Clothing');
    expect(screen.getAllByRole('img').map(img => img.getAttribute('alt')))
      .toEqual(['Casual T-Shirt', 'Formal Shirt', 'Dress', 'Hoodie', 'Suit Jacket']);
  });

  it('switches category and selects an accessory', () => {
    const onSelect = vi.fn();
    render(<AccessoryGallery catalog={catalog} selection={{ watches: 'w2' }} onSelect={onSelect} />);

    fireEvent.click(screen.getByRole('tab', { name: /Watches/ }));

    expect(screen.getByRole('button', { name: /Luxury Watch/ }).getAttribute('aria-pressed')).toBe('true');
    expect(screen.getByRole('button', { name: /Smart Watch/ }).getAttribute('aria-pressed')).toBe('false');

    fireEvent.click(screen.getByRole('button', { name: /Smart Watch/ }));
    expect(onSelect).toHaveBeenCalledWith('watches', 'w1');
  });

  it('swaps a thumbnail that fails to load for the placeholder', () => {
    render(<AccessoryGallery catalog={catalog} selection={{}} onSelect={vi.fn()} />);
    const image = screen.getByRole('img', { name: 'Dress' });

    expect(image.getAttribute('src')).toBe('assets/accessories/clothing/dress_thumb.png');
    fireEvent.error(image);

    expect(image.getAttribute('src')).toBe(PLACEHOLDER_ACCESSORY_IMAGE);
  });

  it('shows an empty state for a category without items', () => {
    const sparse = new AccessoryCatalog({
      categories: [{ id: 'hats', name: 'Hats', icon: '🎩' }],
      accessories: {},
    });
    render(<AccessoryGallery catalog={sparse} selection={{}} onSelect={vi.fn()} />);

    expect(screen.getByText('No accessories available for this category')).toBeTruthy();
  });
});
