import { detectChanges } from './migration.autodetector';
import { MigrationLoader } from './migration.loader';
import { Migration, TableSchema } from './migration.schema';
import { buildMigration, writeMigration } from './migration.writer';
import { stateFromMigrations } from './project-state';

export interface MakeMigrationsOptions {
  directory: string;
  modelTables: readonly TableSchema[];
  /** Slug for the file name instead of the generated one */
  name?: string;
  /** Build the migration without writing it */
  dryRun?: boolean;
}

export interface MakeMigrationsResult {
  /** Undefined when the migrations already match the models */
  migration?: Migration;
  path?: string;
}

export async function makeMigrations(
  options: MakeMigrationsOptions,
): Promise<MakeMigrationsResult> {
  const existing = await new MigrationLoader(options.directory).load();
  const operations = detectChanges(
    stateFromMigrations(existing),
    options.modelTables,
  );

  if (operations.length === 0) {
    return {};
  }

  const migration = buildMigration(existing, operations, options.name);
  if (options.dryRun) {
    return { migration };
  }

  return {
    migration,
    path: await writeMigration(options.directory, migration),
  };
}
