import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DynamooseModule } from 'nestjs-dynamoose';
import { DEFAULT_AWS_REGION } from './common/constants/env.constants';
import { EnvironmentVariables } from './common/env/environment-variables';
import { validateEnvironmentVariables } from './common/env/validation';
import { ArithmeticModule } from './modules/arithmetic/arithmetic.module';
import { ItemsModule } from './modules/items/items.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironmentVariables,
    }),
    DynamooseModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables>) => ({
        aws: {
          region:
            configService.get('AWS_REGION', { infer: true }) ??
            DEFAULT_AWS_REGION,
        },
        local: configService.get('DYNAMODB_ENDPOINT', { infer: true }) ?? false,
      }),
    }),
    ItemsModule,
    ArithmeticModule,
  ],
})
export class AppModule {}
