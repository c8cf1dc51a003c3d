import {
  IsDefined,
  IsEnum,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
} from 'class-validator';
import { NodeEnvironment } from '../constants/env.constants';

export class EnvironmentVariables {
  @IsDefined()
  @IsEnum(NodeEnvironment)
  NODE_ENV!: NodeEnvironment;

  // Prepended to every logical table name, e.g. "test_" -> "test_items"
  @IsOptional()
  @Matches(/^[A-Za-z0-9_.-]*$/, {
    message: 'TABLE_PREFIX may only contain letters, digits, "_", "-" and "."',
  })
  TABLE_PREFIX?: string;

  @IsOptional()
  @IsString()
  AWS_REGION?: string;

  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  DYNAMODB_ENDPOINT?: string;
}
