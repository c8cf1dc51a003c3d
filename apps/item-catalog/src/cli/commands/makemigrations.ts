import { Command } from 'commander';
import { MIGRATIONS_DIRECTORY } from '../../database/database.constants';
import { makeMigrations } from '../../database/migrations/make-migrations';
import { summarizeOperation } from '../../database/migrations/migration.executor';
import { MODEL_TABLES } from '../../database/model-tables';
import { runCommand } from '../run-command';

interface MakeMigrationsCommandOptions {
  name?: string;
  dir: string;
  dryRun?: boolean;
  check?: boolean;
}

export function createMakeMigrationsCommand(): Command {
  return new Command('makemigrations')
    .description('Write a migration for model tables that changed')
    .option('--name <slug>', 'Use this name instead of a generated one')
    .option('--dir <path>', 'Migrations directory', MIGRATIONS_DIRECTORY)
    .option('--dry-run', 'Show the migration without writing it')
    .option('--check', 'Exit with code 1 when a migration is missing')
    .action((options: MakeMigrationsCommandOptions) =>
      runCommand(async () => {
        const { migration, path } = await makeMigrations({
          directory: options.dir,
          modelTables: MODEL_TABLES,
          name: options.name,
          dryRun: options.dryRun || options.check,
        });

        if (!migration) {
          console.log('No changes detected');
          return;
        }

        console.log(`Migration ${migration.name}:`);
        for (const operation of migration.operations) {
          console.log(`  - ${summarizeOperation(operation)}`);
        }
        if (path) {
          console.log(`Written to ${path}`);
        }
        if (options.check) {
          process.exitCode = 1;
        }
      }),
    );
}
