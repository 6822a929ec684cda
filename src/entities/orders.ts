import { z } from 'zod';
import type { Clock } from '../types';
import { InMemoryRepository, type EntityDefinition } from './repository';

const customerName = z
  .string({ required_error: 'Customer Name is required' })
  .trim()
  .min(1, 'Customer Name is required')
  .max(100, 'Customer Name cannot be longer than 100 characters');

export const orderCreateSchema = z.object({ customerName });
export const orderPatchSchema = z.object({ customerName: customerName.optional() });

export type OrderCreate = z.infer<typeof orderCreateSchema>;
export type OrderPatch = z.infer<typeof orderPatchSchema>;

export interface Order {
  id: string;
  customerName: string;
  orderDate: string;
}

export const orderDefinition: EntityDefinition<OrderCreate, OrderPatch> = {
  type: 'orders',
  createSchema: orderCreateSchema,
  patchSchema: orderPatchSchema,
};

export function createOrderRepository(options: { now?: Clock; seed?: Order[]; generateId?: () => string } = {}) {
  const now = options.now ?? Date.now;
  return new InMemoryRepository<Order, OrderCreate, OrderPatch>({
    type: 'Order',
    seed: options.seed,
    generateId: options.generateId,
    build: (input, id) => ({ id, customerName: input.customerName, orderDate: new Date(now()).toISOString() }),
    replace: (existing, input) => ({ ...existing, customerName: input.customerName }),
    merge: (existing, changes) => ({ ...existing, customerName: changes.customerName ?? existing.customerName }),
  });
}
