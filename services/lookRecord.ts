/**
 * Look record model
 * Construction, validation and the persisted (wire) shape of a saved look.
 */

import { z } from 'zod';
import type { AccessorySelection, LookInput, LookRecord } from '../types/look';
import { ValidationError, type ImportIssue } from './errors';

// ============================================
// Wire schema
// ============================================

const nonBlank = (label: string) =>
  z.string({ required_error: `${label} is required` })
    .refine(value => value.trim().length > 0, `${label} must not be empty`);

export const storedLookSchema = z.object({
  id: nonBlank('id'),
  name: nonBlank('name'),
  notes: z.string().nullish().transform(value => value ?? ''),
  date: z.string({ required_error: 'date is required' })
    .refine(value => !Number.isNaN(Date.parse(value)), 'date is not a valid timestamp'),
  image: z.string().nullish().transform(value => value ?? undefined),
  accessories: z.record(z.string(), z.string()).nullish().transform(value => value ?? {}),
});

/** Persisted shape: `date` <-> createdAt, `image` <-> previewReference, `accessories` <-> accessorySelection */
export interface StoredLook {
  id: string;
  name: string;
  notes: string;
  date: string;
  image?: string;
  accessories: AccessorySelection;
}

export type ParseLooksResult =
  | { ok: true; looks: LookRecord[] }
  | { ok: false; issues: ImportIssue[] };

export function toStoredLook(record: LookRecord): StoredLook {
  const stored: StoredLook = {
    id: record.id,
    name: record.name,
    notes: record.notes,
    date: record.createdAt,
    accessories: { ...record.accessorySelection },
  };
  if (record.previewReference !== undefined) {
    stored.image = record.previewReference;
  }
  return stored;
}

export function fromStoredLook(stored: z.output<typeof storedLookSchema>): LookRecord {
  const record: LookRecord = {
    id: stored.id,
    name: stored.name,
    notes: stored.notes,
    createdAt: stored.date,
    accessorySelection: { ...stored.accessories },
  };
  if (stored.image !== undefined) {
    record.previewReference = stored.image;
  }
  return record;
}

/**
 * Import-time check: non-empty id and name, parsable date.
 */
export function isValidLook(candidate: unknown): boolean {
  return storedLookSchema.safeParse(candidate).success;
}

/**
 * Validates every element; any failure (including a repeated id) rejects the whole array.
 */
export function parseStoredLooks(value: unknown): ParseLooksResult {
  if (!Array.isArray(value)) {
    return { ok: false, issues: [{ index: -1, message: 'Expected an array of looks' }] };
  }

  const looks: LookRecord[] = [];
  const issues: ImportIssue[] = [];
  const firstIndexById = new Map<string, number>();

  value.forEach((item, index) => {
    const result = storedLookSchema.safeParse(item);
    if (result.success) {
      const firstIndex = firstIndexById.get(result.data.id);
      if (firstIndex !== undefined) {
        issues.push({ index, message: `id: "${result.data.id}" repeats #${firstIndex}` });
        return;
      }
      firstIndexById.set(result.data.id, index);
      looks.push(fromStoredLook(result.data));
    } else {
      const detail = result.error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      issues.push({ index, message: detail });
    }
  });

  return issues.length > 0 ? { ok: false, issues } : { ok: true, looks };
}

// ============================================
// Construction
// ============================================

let sequence = 0;

/**
 * Time-ordered id with a per-session counter and random suffix, e.g. `look-m1x2y3z4-7-k3j9q1`.
 */
export function createLookId(now: Date = new Date()): string {
  sequence = (sequence + 1) % 1_679_616; // 36^4
  const random = Math.random().toString(36).slice(2, 8).padEnd(6, '0');
  return `look-${now.getTime().toString(36)}-${sequence.toString(36)}-${random}`;
}

export interface CreateLookOptions {
  now?: () => Date;
  generateId?: (now: Date) => string;
}

/**
 * @throws ValidationError if the name is empty after trimming
 */
export function createLookRecord(input: LookInput, options: CreateLookOptions = {}): LookRecord {
  const name = (input.name ?? '').trim();
  if (!name) {
    throw new ValidationError('name', 'Please enter a name for your look');
  }

  const now = (options.now ?? (() => new Date()))();
  const generateId = options.generateId ?? createLookId;

  const record: LookRecord = {
    id: generateId(now),
    name,
    notes: (input.notes ?? '').trim(),
    createdAt: now.toISOString(),
    accessorySelection: { ...(input.accessorySelection ?? {}) },
  };
  if (input.previewReference) {
    record.previewReference = input.previewReference;
  }
  return record;
}
