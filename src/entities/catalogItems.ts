import { z } from 'zod';
import { InMemoryRepository, type EntityDefinition } from './repository';

const name = z
  .string({ required_error: 'Name is required' })
  .trim()
  .min(1, 'Name is required')
  .max(100, 'Name cannot be longer than 100 characters');
const description = z.string().max(500, 'Description cannot be longer than 500 characters');
const price = z
  .number({ required_error: 'Price is required' })
  .min(0.01, 'Price must be greater than 0')
  .multipleOf(0.01, 'Price cannot have more than two decimal places');

export const catalogItemCreateSchema = z.object({ name, description: description.optional(), price });
export const catalogItemPatchSchema = z.object({
  name: name.optional(),
  description: description.nullable().optional(),
  price: price.optional(),
});

export type CatalogItemCreate = z.infer<typeof catalogItemCreateSchema>;
export type CatalogItemPatch = z.infer<typeof catalogItemPatchSchema>;

export interface CatalogItem {
  id: string;
  name: string;
  description?: string;
  price: number;
}

export const catalogItemDefinition: EntityDefinition<CatalogItemCreate, CatalogItemPatch> = {
  type: 'catalog-items',
  createSchema: catalogItemCreateSchema,
  patchSchema: catalogItemPatchSchema,
};

export function createCatalogItemRepository(options: { seed?: CatalogItem[]; generateId?: () => string } = {}) {
  return new InMemoryRepository<CatalogItem, CatalogItemCreate, CatalogItemPatch>({
    type: 'Catalog item',
    seed: options.seed,
    generateId: options.generateId,
    build: (input, id) => ({ id, ...input }),
    replace: (existing, input) => ({ id: existing.id, ...input }),
    merge: (existing, changes) => {
      const { description, ...rest } = changes;
      const merged: CatalogItem = { ...existing };
      if (rest.name !== undefined) merged.name = rest.name;
      if (rest.price !== undefined) merged.price = rest.price;
      if (description === null) delete merged.description;
      else if (description !== undefined) merged.description = description;
      return merged;
    },
  });
}
