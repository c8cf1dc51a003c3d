import { ApiProperty } from '@nestjs/swagger';
import { Item } from '../interfaces/item.interface';

export class ItemResponseDto implements Item {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty({ example: 'Apple' })
  name!: string;

  @ApiProperty({ format: 'date-time' })
  createdAt!: string;
}
