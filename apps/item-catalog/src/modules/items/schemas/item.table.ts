import { TableSchema } from '../../../database/migrations/migration.schema';
import { ITEMS_ID_INDEX, ITEMS_TABLE } from '../items.constants';

/**
 * Table layout the migrations must produce for {@link ItemSchema}.
 * Keep both in step: `catalog makemigrations` diffs this against the migration files.
 */
export const ITEMS_TABLE_SCHEMA: TableSchema = {
  name: ITEMS_TABLE,
  hashKey: 'name',
  rangeKey: 'id',
  attributes: [
    { name: 'id', type: 'S' },
    { name: 'name', type: 'S' },
  ],
  indexes: [{ name: ITEMS_ID_INDEX, hashKey: 'id' }],
};
