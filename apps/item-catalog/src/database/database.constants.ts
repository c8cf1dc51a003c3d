import { join } from 'path';

export const DYNAMODB_CLIENT = Symbol('DYNAMODB_CLIENT');
export const TABLE_ADMIN = Symbol('TABLE_ADMIN');
export const MIGRATION_RECORDER = Symbol('MIGRATION_RECORDER');

// <app>/migrations, from both src/database and dist/database
export const MIGRATIONS_DIRECTORY = join(__dirname, '..', '..', 'migrations');
