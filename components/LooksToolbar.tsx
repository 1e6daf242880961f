/**
 * Search / sort / export / import controls for the saved looks section
 */

import React from 'react';
import { LOOK_SORT_OPTIONS, type LookSortKey } from '../types/look';

interface LooksToolbarProps {
  query: string;
  sortKey: LookSortKey;
  onQueryChange: (query: string) => void;
  onSortChange: (sortKey: LookSortKey) => void;
  onExport: () => void;
  onImport: (file: File) => void;
  exportDisabled?: boolean;
}

const isSortKey = (value: string): value is LookSortKey =>
  LOOK_SORT_OPTIONS.some(option => option.value === value);

export const LooksToolbar: React.FC<LooksToolbarProps> = ({
  query,
  sortKey,
  onQueryChange,
  onSortChange,
  onExport,
  onImport,
  exportDisabled = false,
}) => {
  const handleFileChange = (event: React.ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;
    onImport(file);
    // allow picking the same file again
    event.target.value = '';
  };

  return (
    <div className="looks-toolbar flex flex-wrap items-center gap-3 mb-6">
      <input
        type="search"
        aria-label="Search looks"
        placeholder="Search looks..."
        value={query}
        onChange={e => onQueryChange(e.target.value)}
        className="flex-1 min-w-[200px] px-3 py-2 rounded-md bg-[var(--color-surface)] border border-[var(--color-border)]"
      />
      <select
        aria-label="Sort looks"
        value={sortKey}
        onChange={e => {
          if (isSortKey(e.target.value)) onSortChange(e.target.value);
        }}
        className="px-3 py-2 rounded-md bg-[var(--color-surface)] border border-[var(--color-border)]"
      >
        {LOOK_SORT_OPTIONS.map(option => (
          <option key={option.value} value={option.value}>{option.label}</option>
        ))}
      </select>
      <button
        type="button"
        onClick={onExport}
        disabled={exportDisabled}
        className={`px-4 py-2 rounded-md font-medium text-sm transition-all ${
          exportDisabled
            ? 'bg-gray-700 text-gray-500 cursor-not-allowed'
            : 'bg-green-600 text-white hover:bg-green-500'
        }`}
      >
        📤 Export
      </button>
      <label className="inline-block px-4 py-2 bg-blue-600 text-white rounded-md font-medium text-sm hover:bg-blue-500 cursor-pointer transition-all">
        📥 Import
        <input
          type="file"
          accept=".json,application/json"
          aria-label="Import looks file"
          onChange={handleFileChange}
          className="hidden"
        />
      </label>
    </div>
  );
};
