import { MigrationError } from './migration.error';
import {
  AttributeDefinition,
  IndexSchema,
  MigrationOperation,
  TableSchema,
} from './migration.schema';
import { ProjectState, sameKeys } from './project-state';

/**
 * Operations that turn `state` into the tables the models declare.
 * Key schema changes are refused: DynamoDB cannot alter a table's keys.
 */
export function detectChanges(
  state: ProjectState,
  modelTables: readonly TableSchema[],
): MigrationOperation[] {
  const operations: MigrationOperation[] = [];
  const declared = new Set(modelTables.map((table) => table.name));

  for (const table of modelTables) {
    const existing = state.get(table.name);

    if (!existing) {
      operations.push({ type: 'CreateTable', table });
      continue;
    }

    if (!sameKeys(existing, table)) {
      throw new MigrationError(
        `Cannot change the key schema of table "${table.name}"; declare a new table instead`,
      );
    }

    for (const index of table.indexes) {
      const previous = existing.indexes.find((i) => i.name === index.name);
      if (previous && sameKeys(previous, index)) {
        continue;
      }
      if (previous) {
        operations.push({
          type: 'RemoveIndex',
          table: table.name,
          index: index.name,
        });
      }
      operations.push({
        type: 'AddIndex',
        table: table.name,
        index,
        attributes: keyAttributes(table, index),
      });
    }

    for (const previous of existing.indexes) {
      if (!table.indexes.some((index) => index.name === previous.name)) {
        operations.push({
          type: 'RemoveIndex',
          table: table.name,
          index: previous.name,
        });
      }
    }
  }

  for (const name of state.keys()) {
    if (!declared.has(name)) {
      operations.push({ type: 'DeleteTable', table: name });
    }
  }

  return operations;
}

function keyAttributes(
  table: TableSchema,
  index: IndexSchema,
): AttributeDefinition[] {
  const keys = [index.hashKey, index.rangeKey].filter(
    (key): key is string => key !== undefined,
  );

  return keys.map((key) => {
    const attribute = table.attributes.find((a) => a.name === key);
    if (!attribute) {
      throw new MigrationError(
        `Index "${index.name}" on table "${table.name}" uses undeclared attribute "${key}"`,
      );
    }
    return attribute;
  });
}
