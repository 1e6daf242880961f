import { describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import { LooksGrid } from './LooksGrid';
import type { LookRecord } from '../types/look';

const looks: LookRecord[] = [
  { id: 'a', name: 'Alpha', notes: '', createdAt: '2024-01-02T12:00:00.000Z', accessorySelection: {} },
  { id: 'b', name: 'Beta', notes: '', createdAt: '2024-01-01T12:00:00.000Z', accessorySelection: {} },
];

describe('LooksGrid', () => {
  it('shows the empty state when nothing is saved', () => {
    render(<LooksGrid looks={[]} totalCount={0} query="" onView={vi.fn()} onDelete={vi.fn()} />);

    expect(screen.getByText('No saved looks yet. Pick some accessories and press "Save Look".')).toBeTruthy();
  });

  it('shows the no-results state when the search matches nothing', () => {
    render(<LooksGrid looks={[]} totalCount={2} query="  zebra " onView={vi.fn()} onDelete={vi.fn()} />);

    expect(screen.getByText('No looks matching "zebra" found')).toBeTruthy();
  });

  it('renders one card per look in the given order', () => {
    render(<LooksGrid looks={looks} totalCount={2} query="" onView={vi.fn()} onDelete={vi.fn()} />);

    expect(screen.getAllByRole('heading').map(h => h.textContent)).toEqual(['Alpha', 'Beta']);
  });
});
