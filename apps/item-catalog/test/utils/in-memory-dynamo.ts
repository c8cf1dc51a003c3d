import { TableAdmin } from '../../src/database/table-admin';
import {
  MIGRATIONS_TABLE,
  MIGRATIONS_TABLE_SCHEMA,
  MigrationRecorder,
} from '../../src/database/migrations/migration.recorder';
import {
  AttributeDefinition,
  IndexSchema,
  TableSchema,
} from '../../src/database/migrations/migration.schema';

type Row = Record<string, unknown>;

interface QueryRequest {
  attribute: string;
  value: unknown;
  index?: string;
  consistent?: boolean;
}

interface QueryChain {
  using(index: string): QueryChain;
  consistent(): QueryChain;
  exec(): Promise<Row[]>;
}

interface InMemoryTable {
  schema: TableSchema;
  rows: Map<string, Row>;
}

/**
 * Builds the error the AWS SDK raises for a table that does not exist
 */
export function resourceNotFound(table: string): Error {
  const error = new Error(
    `Requested resource not found: Table: ${table} not found`,
  );
  error.name = 'ResourceNotFoundException';
  return error;
}

function validationError(message: string): Error {
  const error = new Error(message);
  error.name = 'ValidationException';
  return error;
}

function primaryKey(schema: TableSchema, row: Row): string {
  const hash = String(row[schema.hashKey]);
  return schema.rangeKey
    ? `${hash}\u0000${String(row[schema.rangeKey])}`
    : hash;
}

/**
 * In-process stand-in for DynamoDB tables, keyed by logical table name
 */
export class InMemoryTableAdmin implements TableAdmin {
  private readonly tables = new Map<string, InMemoryTable>();

  async tableExists(table: string): Promise<boolean> {
    return this.tables.has(table);
  }

  async createTable(table: TableSchema): Promise<void> {
    if (this.tables.has(table.name)) {
      throw new Error(`Table already exists: ${table.name}`);
    }
    this.tables.set(table.name, {
      schema: { ...table, indexes: [...table.indexes] },
      rows: new Map(),
    });
  }

  async deleteTable(table: string): Promise<void> {
    this.require(table);
    this.tables.delete(table);
  }

  async createIndex(
    table: string,
    index: IndexSchema,
    attributes: AttributeDefinition[],
  ): Promise<void> {
    const { schema } = this.require(table);
    schema.indexes.push(index);
    schema.attributes = [...schema.attributes, ...attributes];
  }

  async deleteIndex(table: string, index: string): Promise<void> {
    const { schema } = this.require(table);
    schema.indexes = schema.indexes.filter((i) => i.name !== index);
  }

  tableNames(): string[] {
    return [...this.tables.keys()].sort();
  }

  schemaOf(table: string): TableSchema {
    return this.require(table).schema;
  }

  put(table: string, row: Row): Row {
    const { schema, rows } = this.require(table);
    rows.set(primaryKey(schema, row), { ...row });
    return { ...row };
  }

  /**
   * Equality query on the table's hash key, or on an index's hash key
   * when `index` is given. Rejects what DynamoDB rejects.
   */
  query(table: string, request: QueryRequest): Row[] {
    const { schema, rows } = this.require(table);
    const { attribute, value, index, consistent } = request;

    let hashKey = schema.hashKey;
    if (index !== undefined) {
      const found = schema.indexes.find((i) => i.name === index);
      if (!found) {
        throw validationError(
          `The table does not have the specified index: ${index}`,
        );
      }
      if (consistent) {
        throw validationError(
          'Consistent reads are not supported on global secondary indexes',
        );
      }
      hashKey = found.hashKey;
    }
    if (attribute !== hashKey) {
      throw validationError('Query condition missed key schema element');
    }

    return [...rows.values()]
      .filter((row) => row[attribute] === value)
      .map((row) => ({ ...row }));
  }

  rows(table: string): Row[] {
    return [...this.require(table).rows.values()];
  }

  private require(table: string): InMemoryTable {
    const found = this.tables.get(table);
    if (!found) {
      throw resourceNotFound(table);
    }
    return found;
  }
}

export class InMemoryMigrationRecorder implements MigrationRecorder {
  constructor(private readonly admin: InMemoryTableAdmin) {}

  async ensureLedger(): Promise<void> {
    if (!(await this.admin.tableExists(MIGRATIONS_TABLE))) {
      await this.admin.createTable(MIGRATIONS_TABLE_SCHEMA);
    }
  }

  async appliedMigrations(): Promise<Set<string>> {
    if (!(await this.admin.tableExists(MIGRATIONS_TABLE))) {
      return new Set();
    }
    return new Set(
      this.admin.rows(MIGRATIONS_TABLE).map((row) => String(row.name)),
    );
  }

  async recordApplied(name: string): Promise<void> {
    this.admin.put(MIGRATIONS_TABLE, {
      name,
      appliedAt: new Date().toISOString(),
    });
  }
}

/**
 * A dynamoose-shaped model over one in-memory table. It fails the way
 * DynamoDB does while the table has not been created.
 */
export function createInMemoryModel(admin: InMemoryTableAdmin, table: string) {
  return {
    create: async (data: Row) => admin.put(table, data),
    query: (attribute: string) => ({
      eq: (value: unknown) => {
        const request: QueryRequest = { attribute, value };
        const chain: QueryChain = {
          using: (index: string) => {
            request.index = index;
            return chain;
          },
          consistent: () => {
            request.consistent = true;
            return chain;
          },
          exec: async () => admin.query(table, request),
        };
        return chain;
      },
    }),
  };
}
