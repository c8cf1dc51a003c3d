import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readdir, readFile } from 'fs/promises';
import { basename, join } from 'path';
import {
  flattenValidationErrors,
  formatValidationIssues,
} from '../../common/validation/validation-issues';
import { MigrationError } from './migration.error';
import { Migration } from './migration.schema';

const MIGRATION_FILE_EXTENSION = '.json';

/**
 * Reads and validates the migration files of a directory, in name order.
 */
export class MigrationLoader {
  constructor(readonly directory: string) {}

  async load(): Promise<Migration[]> {
    const fileNames = (await this.listFiles()).sort();
    const migrations = await Promise.all(
      fileNames.map((fileName) => this.loadFile(fileName)),
    );

    const seen = new Set<string>();
    for (const migration of migrations) {
      for (const dependency of migration.dependencies) {
        if (!seen.has(dependency)) {
          throw new MigrationError(
            `${migration.name} depends on "${dependency}", which is not an earlier migration`,
          );
        }
      }
      seen.add(migration.name);
    }

    return migrations;
  }

  private async listFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory);
      return entries.filter((entry) =>
        entry.endsWith(MIGRATION_FILE_EXTENSION),
      );
    } catch (error) {
      // A project without migrations yet
      if (isNodeError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  private async loadFile(fileName: string): Promise<Migration> {
    const source = await readFile(join(this.directory, fileName), 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(source);
    } catch (error) {
      throw new MigrationError(`${fileName}: invalid JSON`, { cause: error });
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new MigrationError(`${fileName}: expected a JSON object`);
    }

    const migration = plainToInstance(Migration, raw);
    const errors = validateSync(migration, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });
    if (errors.length > 0) {
      throw new MigrationError(
        `${fileName}: invalid migration\n${formatValidationIssues(flattenValidationErrors(errors))}`,
      );
    }

    const expectedName = basename(fileName, MIGRATION_FILE_EXTENSION);
    if (migration.name !== expectedName) {
      throw new MigrationError(
        `${fileName}: name "${migration.name}" does not match the file name`,
      );
    }

    return migration;
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
