import { checkTestSettings } from './check-settings';
import { RunnerOptions } from './runner-options';

/** Environment variable naming the env file `test/jest-setup.ts` loads */
export const TEST_ENV_FILE_VARIABLE = 'CATALOG_TEST_ENV_FILE';

export interface JestSettings extends RunnerOptions {
  testMatch: string[];
  envFile: string;
}

/**
 * Jest settings taken from the `[tests]` section of `catalog.ini`.
 * Rejects the file when its `match` glob selects no test, so a broken
 * pattern fails the run instead of passing with zero tests.
 */
export async function jestSettingsFromIni(file: string): Promise<JestSettings> {
  const { loaded } = await checkTestSettings(file);

  return {
    testMatch: [`<rootDir>/${loaded.settings.match}`],
    envFile: loaded.envFile,
    ...loaded.runnerOptions,
  };
}
