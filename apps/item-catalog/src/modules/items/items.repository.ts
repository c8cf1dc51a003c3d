import { Injectable } from '@nestjs/common';
import { InjectModel, Model } from 'nestjs-dynamoose';
import { BaseRepository } from '../../common/repositories/base.repository';
import { Item, ItemKey } from './interfaces/item.interface';
import {
  ITEMS_ID_INDEX,
  ITEMS_MODEL_NAME,
  ITEMS_TABLE,
} from './items.constants';

/**
 * Repository for item operations in DynamoDB
 */
@Injectable()
export class ItemsRepository extends BaseRepository<Item, ItemKey> {
  /**
   * Constructor for ItemsRepository
   * @param model The dynamoose model for Item
   */
  constructor(
    @InjectModel(ITEMS_MODEL_NAME)
    model: Model<Item, ItemKey>,
  ) {
    super(model, ITEMS_TABLE);
  }

  /**
   * Looked up through the id index, so a just-created item may not be
   * visible yet
   */
  async findById(id: string) {
    const matches = await this.queryIndex(ITEMS_ID_INDEX, 'id', id);
    return matches.at(0);
  }

  /**
   * Every item whose name equals `name` exactly
   */
  findByName(name: string) {
    return this.queryByHashKey('name', name);
  }
}
