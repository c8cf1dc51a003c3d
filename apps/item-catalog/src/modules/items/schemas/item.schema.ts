import { Schema } from 'dynamoose';
import * as crypto from 'crypto';
import { ITEMS_ID_INDEX, MAX_ITEM_NAME_LENGTH } from '../items.constants';

/**
 * DynamoDB schema for the Item entity.
 * Keyed by name so lookups by name read the base table with strong consistency.
 */
export const ItemSchema = new Schema({
  name: {
    type: String,
    hashKey: true,
    validate: (value) =>
      typeof value === 'string' &&
      value.length > 0 &&
      value.length <= MAX_ITEM_NAME_LENGTH,
  },
  id: {
    type: String,
    rangeKey: true,
    default: () => crypto.randomUUID(),
    index: {
      name: ITEMS_ID_INDEX,
      type: 'global',
    },
  },
  createdAt: {
    type: String,
    required: true,
  },
});
