import { describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import { OutfitList } from './OutfitList';
import { loadDefaultCatalog } from '../services/accessoryCatalog';

const catalog = loadDefaultCatalog();

describe('OutfitList', () => {
  it('shows an empty state', () => {
    render(<OutfitList catalog={catalog} selection={{}} onRemove={vi.fn()} onClear={vi.fn()} />);
    expect(screen.getByText('No accessories selected')).toBeTruthy();
  });

  it('lists each selected accessory with its category icon', () => {
    render(
      <OutfitList
        catalog={catalog}
        selection={{ jewelry: 'j1', shoes: 's2' }}
        onRemove={vi.fn()}
        onClear={vi.fn()}
      />
    );

    expect(screen.getAllByRole('listitem').map(li => li.querySelector('span')?.textContent))
      .toEqual(['💎 Gold Necklace', '👟 Dress Shoes']);
  });

  it('removes by category and clears everything', () => {
    const onRemove = vi.fn();
    const onClear = vi.fn();
    render(<OutfitList catalog={catalog} selection={{ watches: 'w1' }} onRemove={onRemove} onClear={onClear} />);

    fireEvent.click(screen.getByRole('button', { name: 'Remove Smart Watch' }));
    fireEvent.click(screen.getByRole('button', { name: 'Clear all' }));

    expect(onRemove).toHaveBeenCalledWith('watches');
    expect(onClear).toHaveBeenCalledTimes(1);
  });
});
