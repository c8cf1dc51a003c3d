import { Command } from 'commander';
import { MigrationExecutor } from '../../database/migrations/migration.executor';
import { runCommand, withDatabase } from '../run-command';

export function createMigrateCommand(): Command {
  return new Command('migrate')
    .description('Apply pending migrations to DynamoDB')
    .action(() =>
      runCommand(async () => {
        const applied = await withDatabase((app) =>
          app.get(MigrationExecutor).migrate(),
        );

        if (applied.length === 0) {
          console.log('No migrations to apply.');
          return;
        }
        for (const name of applied) {
          console.log(`  Applying ${name}... OK`);
        }
      }),
    );
}

export function createShowMigrationsCommand(): Command {
  return new Command('showmigrations')
    .description('List migrations and whether each is applied')
    .action(() =>
      runCommand(async () => {
        const statuses = await withDatabase((app) =>
          app.get(MigrationExecutor).status(),
        );

        if (statuses.length === 0) {
          console.log('(no migrations)');
          return;
        }
        for (const { name, applied } of statuses) {
          console.log(` [${applied ? 'X' : ' '}] ${name}`);
        }
      }),
    );
}
