import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import * as crypto from 'crypto';
import { ItemEntity } from './entities/item.entity';
import { Item } from './interfaces/item.interface';
import { ItemsRepository } from './items.repository';

@Injectable()
export class ItemsService {
  private readonly logger = new Logger(ItemsService.name);

  constructor(private readonly itemsRepo: ItemsRepository) {}

  /**
   * Store a new item
   * @param name The item name, already validated by the caller
   */
  async create(name: string): Promise<ItemEntity> {
    const item: Item = {
      id: crypto.randomUUID(),
      name,
      createdAt: new Date().toISOString(),
    };

    const createdItem = await this.itemsRepo.create(item);
    this.logger.log(`Item saved with ID: ${createdItem.id}`);

    return ItemEntity.from(createdItem);
  }

  /**
   * Fetch the single item with exactly this name
   * @throws NotFoundException when no item has the name
   * @throws ConflictException when several items share it
   */
  async getByName(name: string): Promise<ItemEntity> {
    const matches = await this.itemsRepo.findByName(name);

    if (matches.length === 0) {
      throw new NotFoundException(`Item with name "${name}" does not exist`);
    }
    if (matches.length > 1) {
      throw new ConflictException(
        `${matches.length} items are named "${name}", expected exactly one`,
      );
    }

    return ItemEntity.from(matches[0]);
  }

  async getById(id: string): Promise<ItemEntity> {
    const item = await this.itemsRepo.findById(id);

    if (!item) {
      throw new NotFoundException(`Item with ID "${id}" does not exist`);
    }

    return ItemEntity.from(item);
  }
}
