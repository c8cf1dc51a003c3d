import {
  DynamoDBDocumentClient,
  paginateScan,
  PutCommand,
} from '@aws-sdk/lib-dynamodb';
import { isMissingTableError } from '../../common/errors/no-such-table.error';
import { TableAdmin } from '../table-admin';
import { TableSchema } from './migration.schema';

export const MIGRATIONS_TABLE = 'schema_migrations';

export const MIGRATIONS_TABLE_SCHEMA: TableSchema = {
  name: MIGRATIONS_TABLE,
  hashKey: 'name',
  attributes: [{ name: 'name', type: 'S' }],
  indexes: [],
};

/**
 * Ledger of applied migrations.
 */
export interface MigrationRecorder {
  ensureLedger(): Promise<void>;
  /** Empty when the ledger table does not exist yet */
  appliedMigrations(): Promise<Set<string>>;
  recordApplied(name: string): Promise<void>;
}

export class DynamoDbMigrationRecorder implements MigrationRecorder {
  /**
   * @param tableName Physical name of the ledger table
   */
  constructor(
    private readonly documentClient: DynamoDBDocumentClient,
    private readonly admin: TableAdmin,
    private readonly tableName: string,
  ) {}

  async ensureLedger(): Promise<void> {
    if (!(await this.admin.tableExists(MIGRATIONS_TABLE))) {
      await this.admin.createTable(MIGRATIONS_TABLE_SCHEMA);
    }
  }

  async appliedMigrations(): Promise<Set<string>> {
    const applied = new Set<string>();
    const pages = paginateScan(
      { client: this.documentClient },
      {
        TableName: this.tableName,
        ProjectionExpression: '#name',
        ExpressionAttributeNames: { '#name': 'name' },
      },
    );

    try {
      for await (const page of pages) {
        for (const item of page.Items ?? []) {
          if (typeof item.name === 'string') {
            applied.add(item.name);
          }
        }
      }
    } catch (error) {
      if (isMissingTableError(error)) {
        return new Set();
      }
      throw error;
    }

    return applied;
  }

  async recordApplied(name: string): Promise<void> {
    await this.documentClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: { name, appliedAt: new Date().toISOString() },
      }),
    );
  }
}
