/**
 * Accessory catalog
 * Demo catalog loaded from data/accessories.json (categories + sample accessories per category).
 */

import { z } from 'zod';
import catalogData from '../data/accessories.json';
import type { Accessory, AccessoryCategory, AccessorySelection } from '../types/look';

const catalogSchema = z.object({
  categories: z.array(z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    icon: z.string(),
  })),
  accessories: z.record(z.string(), z.array(z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    image: z.string(),
    thumbnail: z.string(),
    price: z.string().optional(),
    description: z.string().optional(),
  }))),
});

export type CatalogData = z.input<typeof catalogSchema>;

export interface ResolvedSelectionItem {
  category: AccessoryCategory;
  accessory: Accessory;
}

export class AccessoryCatalog {
  private readonly categories: AccessoryCategory[];
  private readonly byCategory = new Map<string, Accessory[]>();
  private readonly byId = new Map<string, Accessory>();

  /**
   * @throws ZodError when the catalog data is malformed
   */
  constructor(data: CatalogData) {
    const parsed = catalogSchema.parse(data);
    this.categories = parsed.categories;

    for (const [categoryId, items] of Object.entries(parsed.accessories)) {
      const accessories = items.map<Accessory>(item => ({
        id: item.id,
        name: item.name,
        category: categoryId,
        image: item.image,
        thumbnail: item.thumbnail,
        price: item.price ?? 'Free',
        description: item.description ?? `Sample ${item.name}`,
      }));
      this.byCategory.set(categoryId, accessories);
      for (const accessory of accessories) {
        this.byId.set(accessory.id, accessory);
      }
    }
  }

  getCategories(): AccessoryCategory[] {
    return [...this.categories];
  }

  getCategory(categoryId: string): AccessoryCategory | undefined {
    return this.categories.find(c => c.id === categoryId);
  }

  getAccessoriesByCategory(categoryId: string): Accessory[] {
    return [...(this.byCategory.get(categoryId) ?? [])];
  }

  getAccessoryById(accessoryId: string): Accessory | undefined {
    return this.byId.get(accessoryId);
  }

  /**
   * Catalog entries for a selection, in selection order. Unknown categories or
   * accessories (e.g. from a newer export) are skipped.
   */
  resolveSelection(selection: AccessorySelection): ResolvedSelectionItem[] {
    const resolved: ResolvedSelectionItem[] = [];
    for (const [categoryId, accessoryId] of Object.entries(selection)) {
      const category = this.getCategory(categoryId);
      const accessory = this.getAccessoryById(accessoryId);
      if (category && accessory && accessory.category === categoryId) {
        resolved.push({ category, accessory });
      }
    }
    return resolved;
  }
}

export function loadDefaultCatalog(): AccessoryCatalog {
  return new AccessoryCatalog(catalogData);
}
