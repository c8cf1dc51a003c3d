import { Item } from '../interfaces/item.interface';

export class ItemEntity implements Item {
  readonly id: string;
  readonly name: string;
  readonly createdAt: string;

  constructor(item: Item) {
    this.id = item.id;
    this.name = item.name;
    this.createdAt = item.createdAt;
  }

  static from(item: Item): ItemEntity {
    return new ItemEntity(item);
  }

  /** Two entities are the same row when their ids match. */
  equals(other: ItemEntity): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return this.name;
  }

  toJSON(): Item {
    return { id: this.id, name: this.name, createdAt: this.createdAt };
  }
}
