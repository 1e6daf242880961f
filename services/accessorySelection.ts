/**
 * Accessory selection helpers (immutable updates, one accessory per category)
 */

import type { AccessorySelection } from '../types/look';

export function selectAccessory(
  selection: AccessorySelection,
  categoryId: string,
  accessoryId: string
): AccessorySelection {
  return { ...selection, [categoryId]: accessoryId };
}

export function removeAccessory(selection: AccessorySelection, categoryId: string): AccessorySelection {
  if (!(categoryId in selection)) return selection;
  const { [categoryId]: _removed, ...rest } = selection;
  return rest;
}

export function clearAccessories(): AccessorySelection {
  return {};
}

export function isSelected(selection: AccessorySelection, categoryId: string, accessoryId: string): boolean {
  return selection[categoryId] === accessoryId;
}

export function countSelected(selection: AccessorySelection): number {
  return Object.keys(selection).length;
}
