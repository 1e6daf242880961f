/**
 * Saved-look type definitions
 * A look is a named snapshot of the avatar preview plus the accessory picked for each category.
 */

// ============================================
// Accessory types
// ============================================

/** category id -> accessory id; at most one accessory per category */
export type AccessorySelection = Record<string, string>;

export interface AccessoryCategory {
  id: string;
  name: string;
  icon: string;          // emoji glyph shown on the category button
}

export interface Accessory {
  id: string;
  name: string;
  category: string;
  image: string;
  thumbnail: string;
  price: string;
  description: string;
}

// ============================================
// Look types
// ============================================

/**
 * In-memory saved look
 */
export interface LookRecord {
  id: string;
  name: string;
  notes: string;
  createdAt: string;               // ISO date string, set once
  previewReference?: string;       // data URI or URL of the avatar at save time
  accessorySelection: AccessorySelection;
}

/**
 * Caller-supplied fields for a new look
 */
export interface LookInput {
  name: string;
  notes?: string;
  previewReference?: string;
  accessorySelection?: AccessorySelection;
}

export type LookSortKey = 'newest' | 'oldest' | 'name';

export const LOOK_SORT_OPTIONS: { value: LookSortKey; label: string }[] = [
  { value: 'newest', label: 'Newest first' },
  { value: 'oldest', label: 'Oldest first' },
  { value: 'name', label: 'Name (A-Z)' },
];

export interface ImportResult {
  imported: number;     // records present in the imported blob
  added: number;
  updated: number;
}

export interface SyncStatus {
  synced: boolean;
  lastError?: Error;
}

// ============================================
// Session types
// ============================================

export type Theme = 'light' | 'dark';

/**
 * Working look kept between page loads
 */
export interface CurrentLookState {
  avatar: string | null;
  accessories: AccessorySelection;
  timestamp: string;
}
