#!/usr/bin/env node
import 'reflect-metadata';
import { Command } from 'commander';
import { createCheckConfigCommand } from './cli/commands/check-config';
import { createCheckWorkflowCommand } from './cli/commands/check-workflow';
import { createMakeMigrationsCommand } from './cli/commands/makemigrations';
import {
  createMigrateCommand,
  createShowMigrationsCommand,
} from './cli/commands/migrate';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('catalog')
    .description('Item catalog maintenance: migrations and project checks');

  [
    createMigrateCommand,
    createShowMigrationsCommand,
    createMakeMigrationsCommand,
    createCheckConfigCommand,
    createCheckWorkflowCommand,
  ].forEach((create) => program.addCommand(create()));

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
