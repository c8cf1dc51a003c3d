import { Logger } from '@nestjs/common';
import { TableAdmin } from '../table-admin';
import { MigrationError } from './migration.error';
import { MigrationLoader } from './migration.loader';
import { MigrationRecorder } from './migration.recorder';
import { Migration, MigrationOperation } from './migration.schema';

export interface MigrationStatus {
  name: string;
  applied: boolean;
}

/**
 * Applies pending migrations in name order and records each one in the ledger.
 */
export class MigrationExecutor {
  private readonly logger = new Logger(MigrationExecutor.name);

  constructor(
    private readonly loader: MigrationLoader,
    private readonly recorder: MigrationRecorder,
    private readonly admin: TableAdmin,
  ) {}

  /**
   * Pending migrations, checked for unmet dependencies before anything runs
   */
  async plan(): Promise<Migration[]> {
    await this.recorder.ensureLedger();

    const [migrations, applied] = await Promise.all([
      this.loader.load(),
      this.recorder.appliedMigrations(),
    ]);
    const pending = migrations.filter((m) => !applied.has(m.name));

    const available = new Set(applied);
    for (const migration of pending) {
      const missing = migration.dependencies.filter((d) => !available.has(d));
      if (missing.length > 0) {
        throw new MigrationError(
          `${migration.name} depends on ${missing.join(', ')}, which is not applied`,
        );
      }
      available.add(migration.name);
    }

    return pending;
  }

  /**
   * @returns Names of the migrations applied by this call
   */
  async migrate(): Promise<string[]> {
    const pending = await this.plan();

    for (const migration of pending) {
      for (const operation of migration.operations) {
        this.logger.log(`${migration.name}: ${summarizeOperation(operation)}`);
        await this.applyOperation(operation);
      }
      await this.recorder.recordApplied(migration.name);
      this.logger.log(`Applied ${migration.name}`);
    }

    return pending.map((migration) => migration.name);
  }

  /**
   * Read-only: a missing ledger counts as nothing applied
   */
  async status(): Promise<MigrationStatus[]> {
    const [migrations, applied] = await Promise.all([
      this.loader.load(),
      this.recorder.appliedMigrations(),
    ]);

    return migrations.map(({ name }) => ({ name, applied: applied.has(name) }));
  }

  private async applyOperation(operation: MigrationOperation): Promise<void> {
    switch (operation.type) {
      case 'CreateTable':
        return this.admin.createTable(operation.table);
      case 'DeleteTable':
        return this.admin.deleteTable(operation.table);
      case 'AddIndex':
        return this.admin.createIndex(
          operation.table,
          operation.index,
          operation.attributes,
        );
      case 'RemoveIndex':
        return this.admin.deleteIndex(operation.table, operation.index);
    }
  }
}

export function summarizeOperation(operation: MigrationOperation): string {
  switch (operation.type) {
    case 'CreateTable':
      return `create table ${operation.table.name}`;
    case 'DeleteTable':
      return `delete table ${operation.table}`;
    case 'AddIndex':
      return `add index ${operation.index.name} to ${operation.table}`;
    case 'RemoveIndex':
      return `remove index ${operation.index} from ${operation.table}`;
  }
}
