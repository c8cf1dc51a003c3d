import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_AWS_REGION } from '../common/constants/env.constants';
import { EnvironmentVariables } from '../common/env/environment-variables';
import {
  DYNAMODB_CLIENT,
  MIGRATION_RECORDER,
  MIGRATIONS_DIRECTORY,
  TABLE_ADMIN,
} from './database.constants';
import { MigrationExecutor } from './migrations/migration.executor';
import { MigrationLoader } from './migrations/migration.loader';
import {
  DynamoDbMigrationRecorder,
  MIGRATIONS_TABLE,
  MigrationRecorder,
} from './migrations/migration.recorder';
import { DynamoDbTableAdmin, TableAdmin } from './table-admin';

type Config = ConfigService<EnvironmentVariables>;

/**
 * Migration tooling wired against the configured DynamoDB endpoint.
 * Expects a global ConfigModule.
 */
@Module({
  providers: [
    {
      provide: DYNAMODB_CLIENT,
      inject: [ConfigService],
      useFactory: (config: Config) =>
        new DynamoDBClient({
          region: config.get('AWS_REGION', { infer: true }) ?? DEFAULT_AWS_REGION,
          endpoint: config.get('DYNAMODB_ENDPOINT', { infer: true }),
        }),
    },
    {
      provide: TABLE_ADMIN,
      inject: [DYNAMODB_CLIENT, ConfigService],
      useFactory: (client: DynamoDBClient, config: Config) =>
        new DynamoDbTableAdmin(
          client,
          config.get('TABLE_PREFIX', { infer: true }) ?? '',
        ),
    },
    {
      provide: MIGRATION_RECORDER,
      inject: [DYNAMODB_CLIENT, TABLE_ADMIN],
      useFactory: (client: DynamoDBClient, admin: DynamoDbTableAdmin) =>
        new DynamoDbMigrationRecorder(
          DynamoDBDocumentClient.from(client),
          admin,
          admin.physicalName(MIGRATIONS_TABLE),
        ),
    },
    {
      provide: MigrationLoader,
      useFactory: () => new MigrationLoader(MIGRATIONS_DIRECTORY),
    },
    {
      provide: MigrationExecutor,
      inject: [MigrationLoader, MIGRATION_RECORDER, TABLE_ADMIN],
      useFactory: (
        loader: MigrationLoader,
        recorder: MigrationRecorder,
        admin: TableAdmin,
      ) => new MigrationExecutor(loader, recorder, admin),
    },
  ],
  exports: [MigrationExecutor, MigrationLoader],
})
export class DatabaseModule {}
