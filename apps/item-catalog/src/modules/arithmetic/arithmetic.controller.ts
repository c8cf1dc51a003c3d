import { Controller, Get, HttpStatus, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { add } from './arithmetic.util';
import { AddQueryDto } from './dto/add-query.dto';

@ApiTags('arithmetic')
@Controller('arithmetic')
export class ArithmeticController {
  @Get('add')
  @ApiOperation({ summary: 'Add two integers' })
  @ApiResponse({ status: HttpStatus.OK, description: '{ "result": x + y }' })
  @ApiResponse({
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    description: 'x or y is not an integer',
  })
  sum(@Query() query: AddQueryDto): { result: number } {
    return { result: add(query.x, query.y) };
  }
}
