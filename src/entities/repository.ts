import { randomUUID } from 'crypto';
import type { z } from 'zod';
import type { Result } from '../types';

export type RepositoryErrorKind = 'NotFound' | 'Validation' | 'Failure';

export interface RepositoryError {
  kind: RepositoryErrorKind;
  message: string;
  details?: unknown;
  cause?: unknown;
}

export interface Entity {
  id: string;
}

export type RepositoryResult<T> = Promise<Result<T, RepositoryError>>;

/** The six operations every entity service exposes. The gateway depends on nothing else. */
export interface EntityRepository<E extends Entity, C, P> {
  getAll(): RepositoryResult<E[]>;
  getById(id: string): RepositoryResult<E>;
  create(input: C): RepositoryResult<E>;
  update(id: string, input: C): RepositoryResult<E>;
  patch(id: string, changes: P): RepositoryResult<E>;
  delete(id: string): RepositoryResult<E>;
}

export interface EntityDefinition<C, P> {
  type: string;
  createSchema: z.ZodType<C, z.ZodTypeDef, unknown>;
  patchSchema: z.ZodType<P, z.ZodTypeDef, unknown>;
}

export function notFound(type: string, id: string): { ok: false; error: RepositoryError } {
  return { ok: false, error: { kind: 'NotFound', message: `${type} with ID ${id} was not found` } };
}

export type InMemoryRepositoryOptions<E extends Entity, C, P> = {
  type: string;
  build: (input: C, id: string) => E;
  replace: (existing: E, input: C) => E;
  merge: (existing: E, changes: P) => E;
  seed?: readonly E[];
  generateId?: () => string;
};

/** Map-backed repository; stands in for the services' database. */
export class InMemoryRepository<E extends Entity, C, P> implements EntityRepository<E, C, P> {
  private readonly rows = new Map<string, E>();
  private readonly generateId: () => string;

  constructor(private readonly options: InMemoryRepositoryOptions<E, C, P>) {
    this.generateId = options.generateId ?? randomUUID;
    for (const row of options.seed ?? []) this.rows.set(row.id, row);
  }

  async getAll(): RepositoryResult<E[]> {
    return { ok: true, value: [...this.rows.values()] };
  }

  async getById(id: string): RepositoryResult<E> {
    const row = this.rows.get(id);
    return row ? { ok: true, value: row } : notFound(this.options.type, id);
  }

  async create(input: C): RepositoryResult<E> {
    const row = this.options.build(input, this.generateId());
    this.rows.set(row.id, row);
    return { ok: true, value: row };
  }

  async update(id: string, input: C): RepositoryResult<E> {
    const existing = this.rows.get(id);
    if (!existing) return notFound(this.options.type, id);
    const row = this.options.replace(existing, input);
    this.rows.set(id, row);
    return { ok: true, value: row };
  }

  async patch(id: string, changes: P): RepositoryResult<E> {
    const existing = this.rows.get(id);
    if (!existing) return notFound(this.options.type, id);
    const row = this.options.merge(existing, changes);
    this.rows.set(id, row);
    return { ok: true, value: row };
  }

  async delete(id: string): RepositoryResult<E> {
    const existing = this.rows.get(id);
    if (!existing) return notFound(this.options.type, id);
    this.rows.delete(id);
    return { ok: true, value: existing };
  }
}
