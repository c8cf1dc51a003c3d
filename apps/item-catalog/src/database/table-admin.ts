import {
  BillingMode,
  CreateTableCommand,
  DeleteTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  IndexStatus,
  KeySchemaElement,
  KeyType,
  ProjectionType,
  TableStatus,
  UpdateTableCommand,
  waitUntilTableExists,
  waitUntilTableNotExists,
} from '@aws-sdk/client-dynamodb';
import {
  checkExceptions,
  createWaiter,
  WaiterState,
} from '@smithy/util-waiter';
import { isMissingTableError } from '../common/errors/no-such-table.error';
import {
  AttributeDefinition,
  IndexSchema,
  TableSchema,
} from './migrations/migration.schema';

/**
 * Schema-changing calls the migration executor needs.
 * Every method takes logical table names.
 */
export interface TableAdmin {
  tableExists(table: string): Promise<boolean>;
  createTable(table: TableSchema): Promise<void>;
  deleteTable(table: string): Promise<void>;
  createIndex(
    table: string,
    index: IndexSchema,
    attributes: AttributeDefinition[],
  ): Promise<void>;
  deleteIndex(table: string, index: string): Promise<void>;
}

/** Polling bounds for table and index changes, in seconds */
export interface TableWaitOptions {
  maxWaitTime: number;
  minDelay: number;
  maxDelay: number;
}

const DEFAULT_WAIT_OPTIONS: TableWaitOptions = {
  maxWaitTime: 600,
  minDelay: 5,
  maxDelay: 30,
};

export class DynamoDbTableAdmin implements TableAdmin {
  constructor(
    private readonly client: DynamoDBClient,
    private readonly tablePrefix = '',
    private readonly waitOptions: TableWaitOptions = DEFAULT_WAIT_OPTIONS,
  ) {}

  physicalName(table: string): string {
    return `${this.tablePrefix}${table}`;
  }

  async tableExists(table: string): Promise<boolean> {
    try {
      await this.client.send(
        new DescribeTableCommand({ TableName: this.physicalName(table) }),
      );
      return true;
    } catch (error) {
      if (isMissingTableError(error)) {
        return false;
      }
      throw error;
    }
  }

  async createTable(table: TableSchema): Promise<void> {
    const TableName = this.physicalName(table.name);

    await this.client.send(
      new CreateTableCommand({
        TableName,
        BillingMode: BillingMode.PAY_PER_REQUEST,
        AttributeDefinitions: table.attributes.map(toAttributeDefinition),
        KeySchema: keySchema(table.hashKey, table.rangeKey),
        GlobalSecondaryIndexes:
          table.indexes.length > 0
            ? table.indexes.map((index) => ({
                IndexName: index.name,
                KeySchema: keySchema(index.hashKey, index.rangeKey),
                Projection: { ProjectionType: ProjectionType.ALL },
              }))
            : undefined,
      }),
    );
    await waitUntilTableExists(
      { client: this.client, ...this.waitOptions },
      { TableName },
    );
  }

  async deleteTable(table: string): Promise<void> {
    const TableName = this.physicalName(table);

    await this.client.send(new DeleteTableCommand({ TableName }));
    await waitUntilTableNotExists(
      { client: this.client, ...this.waitOptions },
      { TableName },
    );
  }

  async createIndex(
    table: string,
    index: IndexSchema,
    attributes: AttributeDefinition[],
  ): Promise<void> {
    const TableName = this.physicalName(table);

    await this.client.send(
      new UpdateTableCommand({
        TableName,
        AttributeDefinitions: attributes.map(toAttributeDefinition),
        GlobalSecondaryIndexUpdates: [
          {
            Create: {
              IndexName: index.name,
              KeySchema: keySchema(index.hashKey, index.rangeKey),
              Projection: { ProjectionType: ProjectionType.ALL },
            },
          },
        ],
      }),
    );
    await this.waitForIndex(TableName, index.name, 'active');
  }

  async deleteIndex(table: string, index: string): Promise<void> {
    const TableName = this.physicalName(table);

    await this.client.send(
      new UpdateTableCommand({
        TableName,
        GlobalSecondaryIndexUpdates: [{ Delete: { IndexName: index } }],
      }),
    );
    await this.waitForIndex(TableName, index, 'deleted');
  }

  /**
   * Polls until the table is ACTIVE again and the index has finished
   * backfilling or is gone. A table stays UPDATING until then and refuses
   * further index changes.
   */
  private async waitForIndex(
    TableName: string,
    IndexName: string,
    until: 'active' | 'deleted',
  ): Promise<void> {
    const result = await createWaiter(
      { client: this.client, ...this.waitOptions },
      { TableName },
      async (client, input) => {
        const { Table } = await client.send(new DescribeTableCommand(input));
        const index = Table?.GlobalSecondaryIndexes?.find(
          (candidate) => candidate.IndexName === IndexName,
        );
        const indexSettled =
          until === 'active'
            ? index?.IndexStatus === IndexStatus.ACTIVE
            : index === undefined;

        return {
          state:
            Table?.TableStatus === TableStatus.ACTIVE && indexSettled
              ? WaiterState.SUCCESS
              : WaiterState.RETRY,
        };
      },
    );
    checkExceptions(result);
  }
}

function keySchema(hashKey: string, rangeKey?: string): KeySchemaElement[] {
  const schema: KeySchemaElement[] = [
    { AttributeName: hashKey, KeyType: KeyType.HASH },
  ];
  if (rangeKey) {
    schema.push({ AttributeName: rangeKey, KeyType: KeyType.RANGE });
  }
  return schema;
}

function toAttributeDefinition(attribute: AttributeDefinition) {
  return { AttributeName: attribute.name, AttributeType: attribute.type };
}
