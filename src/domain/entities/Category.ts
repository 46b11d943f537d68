export const CATEGORY_NAME_PATTERN = /^[A-Za-z0-9\s-]+$/;
export const CATEGORY_SLUG_PATTERN = /^[-a-zA-Z0-9_]+$/;
export const MAX_DISPLAY_ORDER = 1000;
export const CATEGORY_PATH_SEPARATOR = ' > ';

export interface Category {
  id: string;
  name: string;
  description: string | null;
  slug: string;
  isActive: boolean;
  displayOrder: number;
  parentId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CategoryData {
  name: string;
  description?: string | null;
  slug: string;
  isActive?: boolean;
  displayOrder?: number;
  parentId?: string | null;
}

export type CategoryPatch = Partial<CategoryData>;

// Sibling order used by every listing: display order first, then name.
export const compareCategories = (a: Category, b: Category): number =>
  a.displayOrder - b.displayOrder || a.name.localeCompare(b.name);
