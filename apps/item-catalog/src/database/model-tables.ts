import { ITEMS_TABLE_SCHEMA } from '../modules/items/schemas/item.table';
import { TableSchema } from './migrations/migration.schema';

/** Every table a model reads or writes. */
export const MODEL_TABLES: readonly TableSchema[] = [ITEMS_TABLE_SCHEMA];
