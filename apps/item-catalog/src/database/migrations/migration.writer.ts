import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { MigrationError } from './migration.error';
import { Migration, MigrationOperation } from './migration.schema';

/**
 * Next `NNNN_slug` name after the existing migrations.
 * The slug defaults to `initial` for the first migration, otherwise it
 * describes the first operation.
 */
export function nextMigrationName(
  existing: readonly Migration[],
  operations: readonly MigrationOperation[],
  slug?: string,
): string {
  const last = existing.at(-1);
  const number = last ? Number.parseInt(last.name.slice(0, 4), 10) + 1 : 1;
  const suffix =
    slug ??
    (existing.length === 0 || operations.length === 0
      ? 'initial'
      : describeOperation(operations[0]));

  const slugged = slugify(suffix);
  if (!slugged) {
    throw new MigrationError(`"${suffix}" is not a usable migration name`);
  }

  return `${String(number).padStart(4, '0')}_${slugged}`;
}

export function buildMigration(
  existing: readonly Migration[],
  operations: MigrationOperation[],
  slug?: string,
): Migration {
  const last = existing.at(-1);

  return {
    name: nextMigrationName(existing, operations, slug),
    dependencies: last ? [last.name] : [],
    operations,
  };
}

/**
 * @returns The path of the written file
 */
export async function writeMigration(
  directory: string,
  migration: Migration,
): Promise<string> {
  await mkdir(directory, { recursive: true });

  const path = join(directory, `${migration.name}.json`);
  await writeFile(path, `${JSON.stringify(migration, null, 2)}\n`, 'utf-8');

  return path;
}

function describeOperation(operation: MigrationOperation): string {
  switch (operation.type) {
    case 'CreateTable':
      return `create_${operation.table.name}`;
    case 'DeleteTable':
      return `delete_${operation.table}`;
    case 'AddIndex':
      return `add_${operation.table}_${operation.index.name}`;
    case 'RemoveIndex':
      return `remove_${operation.table}_${operation.index}`;
  }
}

function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}
