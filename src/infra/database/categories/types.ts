import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Categories Table
export interface Categories {
  id: string;
  name: string;
  description: string | null;
  icon_url: string | null;
  created_at: Generated<Timestamp>;
}

export interface CategoriesDatabase {
  categories: Categories;
}
