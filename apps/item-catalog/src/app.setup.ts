import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { DefaultValidationPipe } from './common/pipes/default-validation.pipe';

/**
 * Global pipe, filter and Swagger docs shared by the Lambda and the e2e tests.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(new DefaultValidationPipe());
  app.useGlobalFilters(new AllExceptionsFilter());

  const config = new DocumentBuilder()
    .setTitle('Item Catalog API')
    .setDescription('Stores named items and adds numbers')
    .setVersion('1.0')
    .addTag('items', 'Create and look up items')
    .addTag('arithmetic', 'Integer helpers')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);
}
