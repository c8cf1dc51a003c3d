export const ITEMS_MODEL_NAME = 'Item';
export const ITEMS_TABLE = 'items';
export const ITEMS_ID_INDEX = 'id-index';
export const MAX_ITEM_NAME_LENGTH = 100;
