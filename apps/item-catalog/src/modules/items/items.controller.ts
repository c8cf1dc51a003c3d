import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CreateItemDto } from './dto/create-item.dto';
import { FindItemQuery } from './dto/find-item.query';
import { ItemResponseDto } from './dto/item-response.dto';
import { ItemEntity } from './entities/item.entity';
import { ItemsService } from './items.service';

@ApiTags('items')
@Controller('items')
export class ItemsController {
  private readonly logger = new Logger(ItemsController.name);

  constructor(private readonly itemsService: ItemsService) {}

  @Post()
  @ApiOperation({ summary: 'Create an item' })
  @ApiResponse({
    status: HttpStatus.CREATED,
    description: 'Item stored',
    type: ItemResponseDto,
  })
  @ApiResponse({
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    description: 'Name missing, empty or too long',
  })
  @ApiResponse({
    status: HttpStatus.SERVICE_UNAVAILABLE,
    description: 'Items table missing, migrations not applied',
  })
  create(@Body() createItemDto: CreateItemDto): Promise<ItemEntity> {
    this.logger.log(`Creating item: ${createItemDto.name}`);

    return this.itemsService.create(createItemDto.name);
  }

  @Get()
  @ApiOperation({ summary: 'Get the item with exactly this name' })
  @ApiResponse({ status: HttpStatus.OK, type: ItemResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'No such item' })
  @ApiResponse({
    status: HttpStatus.CONFLICT,
    description: 'Several items share the name',
  })
  findByName(@Query() query: FindItemQuery): Promise<ItemEntity> {
    return this.itemsService.getByName(query.name);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an item by ID' })
  @ApiResponse({ status: HttpStatus.OK, type: ItemResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'No such item' })
  findById(@Param('id', new ParseUUIDPipe()) id: string): Promise<ItemEntity> {
    return this.itemsService.getById(id);
  }
}
