import { describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import { LookCard, PLACEHOLDER_LOOK_IMAGE, formatLookDate } from './LookCard';
import type { LookRecord } from '../types/look';

const look: LookRecord = {
  id: 'look-7',
  name: 'Brunch',
  notes: 'linen + loafers',
  createdAt: '2024-03-05T12:00:00.000Z',
  accessorySelection: { clothing: 'c2' },
};

describe('formatLookDate', () => {
  it('formats as a short date', () => {
    expect(formatLookDate('2024-03-05T12:00:00.000Z')).toBe('Mar 5, 2024');
  });

  it('returns an empty string for bad input', () => {
    expect(formatLookDate('someday')).toBe('');
  });
});

describe('LookCard', () => {
  it('shows name, date, notes and the placeholder image', () => {
    render(<LookCard look={look} onView={vi.fn()} onDelete={vi.fn()} />);

    expect(screen.getByRole('heading', { name: 'Brunch' })).toBeTruthy();
    expect(screen.getByText('Mar 5, 2024')).toBeTruthy();
    expect(screen.getByText('linen + loafers')).toBeTruthy();
    expect(screen.getByRole('img', { name: 'Brunch' }).getAttribute('src')).toBe(PLACEHOLDER_LOOK_IMAGE);
  });

  it('uses the preview image when there is one', () => {
    render(<LookCard look={{ ...look, previewReference: 'preview.png' }} onView={vi.fn()} onDelete={vi.fn()} />);
    expect(screen.getByRole('img', { name: 'Brunch' }).getAttribute('src')).toBe('preview.png');
  });

  it('falls back to the placeholder when the preview fails to load', () => {
    render(<LookCard look={{ ...look, previewReference: 'missing.png' }} onView={vi.fn()} onDelete={vi.fn()} />);
    const image = screen.getByRole('img', { name: 'Brunch' });

    fireEvent.error(image);

    expect(image.getAttribute('src')).toBe(PLACEHOLDER_LOOK_IMAGE);
  });

  it('passes the id to onView', () => {
    const onView = vi.fn();
    render(<LookCard look={look} onView={onView} onDelete={vi.fn()} />);

    fireEvent.click(screen.getByRole('button', { name: /View/ }));

    expect(onView).toHaveBeenCalledWith('look-7');
  });

  it('deletes only after confirmation', () => {
    const onDelete = vi.fn();
    const confirmDelete = vi.fn().mockReturnValueOnce(false).mockReturnValueOnce(true);
    render(<LookCard look={look} onView={vi.fn()} onDelete={onDelete} confirmDelete={confirmDelete} />);
    const button = screen.getByRole('button', { name: /Delete/ });

    fireEvent.click(button);
    expect(onDelete).not.toHaveBeenCalled();

    fireEvent.click(button);
    expect(confirmDelete).toHaveBeenCalledWith(look);
    expect(onDelete).toHaveBeenCalledWith('look-7');
  });
});
