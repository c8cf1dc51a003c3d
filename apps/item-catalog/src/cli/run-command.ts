import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CliModule } from './cli.module';

const logger = new Logger('catalog');

/**
 * Runs a command body, reporting a failure on stderr with exit code 1.
 */
export async function runCommand(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

/**
 * Boots the database wiring for one command and closes it afterwards.
 */
export async function withDatabase<T>(
  body: (app: INestApplicationContext) => Promise<T>,
): Promise<T> {
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    return await body(app);
  } finally {
    await app.close();
  }
}
