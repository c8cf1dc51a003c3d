import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import serverlessExpress from '@codegenie/serverless-express';
import { Callback, Context, Handler } from 'aws-lambda';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';

let cachedServer: Handler | undefined;

async function bootstrap(): Promise<Handler> {
  // Create the NestJS application
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  configureApp(app);

  await app.init();

  const expressApp = app.getHttpAdapter().getInstance();
  return serverlessExpress({ app: expressApp });
}

export const handler: Handler = async (
  event: unknown,
  context: Context,
  callback: Callback,
): Promise<unknown> => {
  const logger = new Logger('Lambda Handler');

  // Set the AWS request ID in the logs for traceability
  logger.log(`Got a new request with ID: ${context.awsRequestId}`);

  // Initialize the server if not already cached
  if (!cachedServer) {
    logger.log('Initializing server (cold start)');
    cachedServer = await bootstrap();
  }

  return cachedServer(event, context, callback);
};
