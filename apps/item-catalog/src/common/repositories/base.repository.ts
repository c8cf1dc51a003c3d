import { Item, Model } from 'nestjs-dynamoose';
import {
  isMissingTableError,
  NoSuchTableError,
} from '../errors/no-such-table.error';

/**
 * Base repository for DynamoDB operations using nestjs-dynamoose
 * @template T The entity type
 * @template K The key type of the entity
 */
export abstract class BaseRepository<T, K> {
  /**
   * @param _model The dynamoose model
   * @param tableName Logical table name, reported when the table is missing
   */
  constructor(
    protected readonly _model: Model<T, K>,
    protected readonly tableName: string,
  ) {}

  /**
   * Save an entity to DynamoDB
   * @param data The entity to save, key included
   * @returns A promise resolving to the saved entity
   */
  async create(data: T): Promise<Item<T>> {
    return this.run(() => this._model.create(data));
  }

  /**
   * Exact-match query on the table's hash key. Reads are strongly
   * consistent: a row is visible as soon as `create` resolves.
   * @param attribute The table hash key
   * @param value The value the hash key must equal
   */
  protected async queryByHashKey(
    attribute: keyof T & string,
    value: string,
  ): Promise<Item<T>[]> {
    return this.run(async () => {
      const response = await this._model
        .query(attribute)
        .eq(value)
        .consistent()
        .exec();
      return [...response];
    });
  }

  /**
   * Exact-match query on a global secondary index. Index reads are
   * eventually consistent.
   * @param index The index name
   * @param attribute The index hash key
   * @param value The value the hash key must equal
   */
  protected async queryIndex(
    index: string,
    attribute: keyof T & string,
    value: string,
  ): Promise<Item<T>[]> {
    return this.run(async () => {
      const response = await this._model
        .query(attribute)
        .eq(value)
        .using(index)
        .exec();
      return [...response];
    });
  }

  private async run<R>(operation: () => Promise<R>): Promise<R> {
    try {
      return await operation();
    } catch (error) {
      if (isMissingTableError(error)) {
        throw new NoSuchTableError(this.tableName, { cause: error });
      }
      throw error;
    }
  }
}
