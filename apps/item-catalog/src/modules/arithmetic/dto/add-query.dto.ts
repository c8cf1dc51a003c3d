import { ApiProperty } from '@nestjs/swagger';
import { Transform, TransformFnParams } from 'class-transformer';
import { IsInt, Max, Min } from 'class-validator';

const INTEGER_PATTERN = /^-?\d+$/;

// Blank or malformed input stays a string so IsInt rejects it
const toInteger = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' && INTEGER_PATTERN.test(value)
    ? Number(value)
    : value;

export class AddQueryDto {
  @ApiProperty({ example: 1 })
  @Transform(toInteger)
  @IsInt()
  @Min(Number.MIN_SAFE_INTEGER)
  @Max(Number.MAX_SAFE_INTEGER)
  x!: number;

  @ApiProperty({ example: 2 })
  @Transform(toInteger)
  @IsInt()
  @Min(Number.MIN_SAFE_INTEGER)
  @Max(Number.MAX_SAFE_INTEGER)
  y!: number;
}
