import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DynamooseModule } from 'nestjs-dynamoose';
import { EnvironmentVariables } from '../../common/env/environment-variables';
import { ItemsController } from './items.controller';
import { ItemsRepository } from './items.repository';
import { ItemsService } from './items.service';
import { ITEMS_MODEL_NAME, ITEMS_TABLE } from './items.constants';
import { ItemSchema } from './schemas/item.schema';

@Module({
  imports: [
    DynamooseModule.forFeatureAsync([
      {
        name: ITEMS_MODEL_NAME,
        imports: [ConfigModule],
        inject: [ConfigService],
        useFactory: (
          _,
          configService: ConfigService<EnvironmentVariables>,
        ) => ({
          schema: ItemSchema,
          options: {
            tableName: `${configService.get('TABLE_PREFIX', { infer: true }) ?? ''}${ITEMS_TABLE}`,
            // Tables are owned by the migrations, never by the model
            create: false,
            update: false,
            waitForActive: false,
          },
        }),
      },
    ]),
  ],
  controllers: [ItemsController],
  providers: [ItemsService, ItemsRepository],
})
export class ItemsModule {}
