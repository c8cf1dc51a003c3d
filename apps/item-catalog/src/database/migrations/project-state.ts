import { MigrationError } from './migration.error';
import {
  AttributeDefinition,
  IndexSchema,
  Migration,
  MigrationOperation,
  TableSchema,
} from './migration.schema';

/** Logical table name -> schema the migrations have built so far. */
export type ProjectState = ReadonlyMap<string, TableSchema>;

export function emptyState(): ProjectState {
  return new Map();
}

/**
 * Replays one operation on top of `state` without mutating it.
 */
export function applyOperation(
  state: ProjectState,
  operation: MigrationOperation,
): ProjectState {
  const next = new Map(state);

  switch (operation.type) {
    case 'CreateTable': {
      const { table } = operation;
      if (next.has(table.name)) {
        throw new MigrationError(`Table "${table.name}" already exists`);
      }
      next.set(table.name, table);
      return next;
    }
    case 'DeleteTable': {
      requireTable(next, operation.table);
      next.delete(operation.table);
      return next;
    }
    case 'AddIndex': {
      const table = requireTable(next, operation.table);
      if (table.indexes.some((index) => index.name === operation.index.name)) {
        throw new MigrationError(
          `Index "${operation.index.name}" already exists on table "${table.name}"`,
        );
      }
      next.set(table.name, {
        ...table,
        attributes: mergeAttributes(table.attributes, operation.attributes),
        indexes: [...table.indexes, operation.index],
      });
      return next;
    }
    case 'RemoveIndex': {
      const table = requireTable(next, operation.table);
      if (!table.indexes.some((index) => index.name === operation.index)) {
        throw new MigrationError(
          `Index "${operation.index}" does not exist on table "${table.name}"`,
        );
      }
      next.set(table.name, {
        ...table,
        indexes: table.indexes.filter((index) => index.name !== operation.index),
      });
      return next;
    }
  }
}

export function stateFromMigrations(
  migrations: readonly Migration[],
): ProjectState {
  let state = emptyState();

  for (const migration of migrations) {
    for (const operation of migration.operations) {
      try {
        state = applyOperation(state, operation);
      } catch (error) {
        if (error instanceof MigrationError) {
          throw new MigrationError(`${migration.name}: ${error.message}`, {
            cause: error,
          });
        }
        throw error;
      }
    }
  }

  return state;
}

export function sameKeys(
  a: Pick<IndexSchema, 'hashKey' | 'rangeKey'>,
  b: Pick<IndexSchema, 'hashKey' | 'rangeKey'>,
): boolean {
  return a.hashKey === b.hashKey && a.rangeKey === b.rangeKey;
}

function requireTable(
  state: ReadonlyMap<string, TableSchema>,
  name: string,
): TableSchema {
  const table = state.get(name);
  if (!table) {
    throw new MigrationError(`Table "${name}" does not exist`);
  }
  return table;
}

function mergeAttributes(
  existing: AttributeDefinition[],
  added: AttributeDefinition[],
): AttributeDefinition[] {
  const known = new Set(existing.map((attribute) => attribute.name));
  return [
    ...existing,
    ...added.filter((attribute) => !known.has(attribute.name)),
  ];
}
