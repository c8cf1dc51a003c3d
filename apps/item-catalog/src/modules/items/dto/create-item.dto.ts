import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { MAX_ITEM_NAME_LENGTH } from '../items.constants';

export class CreateItemDto {
  @ApiProperty({ example: 'Apple', maxLength: MAX_ITEM_NAME_LENGTH })
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_ITEM_NAME_LENGTH)
  name!: string;
}
