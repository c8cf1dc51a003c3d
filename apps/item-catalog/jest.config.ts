import 'reflect-metadata';
import type { Config } from 'jest';
import { join } from 'path';
import {
  jestSettingsFromIni,
  TEST_ENV_FILE_VARIABLE,
} from './src/tooling/settings/jest-settings';

export default async (): Promise<Config> => {
  const { envFile, ...settings } = await jestSettingsFromIni(
    join(__dirname, 'catalog.ini'),
  );
  process.env[TEST_ENV_FILE_VARIABLE] = envFile;

  return {
    preset: 'ts-jest',
    moduleFileExtensions: ['js', 'json', 'ts'],
    rootDir: __dirname,
    testPathIgnorePatterns: ['/node_modules/', '/dist/', '/coverage/'],
    setupFiles: ['reflect-metadata', '<rootDir>/test/jest-setup.ts'],
    collectCoverageFrom: ['src/**/*.ts', '!src/main.ts', '!src/cli.ts'],
    coverageDirectory: 'coverage',
    testEnvironment: '<rootDir>/test/node-environment.ts',
    ...settings,
  };
};
