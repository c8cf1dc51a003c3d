import { Type } from 'class-transformer';
import {
  Equals,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';

export const ATTRIBUTE_TYPES = ['S', 'N', 'B'] as const;
export type AttributeType = (typeof ATTRIBUTE_TYPES)[number];

export const OPERATION_TYPES = [
  'CreateTable',
  'DeleteTable',
  'AddIndex',
  'RemoveIndex',
] as const;

export const MIGRATION_NAME_PATTERN = /^\d{4}_[a-z0-9_]+$/;

export class AttributeDefinition {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsIn(ATTRIBUTE_TYPES)
  type!: AttributeType;
}

export class IndexSchema {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  hashKey!: string;

  @IsOptional()
  @IsString()
  rangeKey?: string;
}

export class TableSchema {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  hashKey!: string;

  @IsOptional()
  @IsString()
  rangeKey?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AttributeDefinition)
  attributes!: AttributeDefinition[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => IndexSchema)
  indexes!: IndexSchema[];
}

/** Fallback target for an unrecognised `type`, so the error names it. */
export class MigrationOperationBase {
  @IsIn(OPERATION_TYPES)
  type!: string;
}

export class CreateTableOperation extends MigrationOperationBase {
  @Equals('CreateTable')
  type = 'CreateTable' as const;

  @ValidateNested()
  @Type(() => TableSchema)
  table!: TableSchema;
}

export class DeleteTableOperation extends MigrationOperationBase {
  @Equals('DeleteTable')
  type = 'DeleteTable' as const;

  @IsString()
  @IsNotEmpty()
  table!: string;
}

export class AddIndexOperation extends MigrationOperationBase {
  @Equals('AddIndex')
  type = 'AddIndex' as const;

  @IsString()
  @IsNotEmpty()
  table!: string;

  @ValidateNested()
  @Type(() => IndexSchema)
  index!: IndexSchema;

  // Definitions for the index key attributes
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AttributeDefinition)
  attributes!: AttributeDefinition[];
}

export class RemoveIndexOperation extends MigrationOperationBase {
  @Equals('RemoveIndex')
  type = 'RemoveIndex' as const;

  @IsString()
  @IsNotEmpty()
  table!: string;

  @IsString()
  @IsNotEmpty()
  index!: string;
}

export type MigrationOperation =
  | CreateTableOperation
  | DeleteTableOperation
  | AddIndexOperation
  | RemoveIndexOperation;

/**
 * One `migrations/NNNN_slug.json` file.
 */
export class Migration {
  @Matches(MIGRATION_NAME_PATTERN, {
    message: 'name must look like 0001_initial',
  })
  name!: string;

  @IsArray()
  @IsString({ each: true })
  dependencies!: string[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MigrationOperationBase, {
    discriminator: {
      property: 'type',
      subTypes: [
        { value: CreateTableOperation, name: 'CreateTable' },
        { value: DeleteTableOperation, name: 'DeleteTable' },
        { value: AddIndexOperation, name: 'AddIndex' },
        { value: RemoveIndexOperation, name: 'RemoveIndex' },
      ],
    },
    keepDiscriminatorProperty: true,
  })
  operations!: MigrationOperation[];
}
