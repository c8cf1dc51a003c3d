import { plainToInstance } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, validateSync } from 'class-validator';
import { parse as parseDotenv } from 'dotenv';
import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { EnvironmentVariables } from '../../common/env/environment-variables';
import { validateEnvironmentVariables } from '../../common/env/validation';
import {
  flattenValidationErrors,
  formatValidationIssues,
} from '../../common/validation/validation-issues';
import { inlineCommentHint } from './inline-comment';
import { IniParseError, parseIni } from './ini-parser';
import {
  parseRunnerOptions,
  RunnerOptions,
  UnsupportedRunnerOptionError,
} from './runner-options';

export const TEST_SETTINGS_SECTION = 'tests';

export class SettingsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SettingsError';
  }
}

/**
 * The `[tests]` section of `catalog.ini`.
 */
export class TestSettings {
  /** Env file the tests run with, relative to the INI file */
  @IsString()
  @IsNotEmpty()
  settings!: string;

  /** Glob selecting the test files */
  @IsString()
  @IsNotEmpty()
  match!: string;

  /** Extra options handed to the test runner */
  @IsOptional()
  @IsString()
  options?: string;
}

export interface LoadedTestSettings {
  file: string;
  rootDir: string;
  settings: TestSettings;
  envFile: string;
  /** Raw entries of the env file */
  variables: Record<string, string>;
  environment: EnvironmentVariables;
  runnerOptions: RunnerOptions;
}

export async function loadTestSettings(
  file: string,
): Promise<LoadedTestSettings> {
  const rootDir = dirname(resolve(file));
  const settings = parseTestSettings(file, await readFile(file, 'utf-8'));
  const envFile = resolve(rootDir, settings.settings);
  const runnerOptions = readRunnerOptions(file, settings);

  let envSource: string;
  try {
    envSource = await readFile(envFile, 'utf-8');
  } catch (error) {
    throw new SettingsError(
      `${file}: settings file "${settings.settings}" not found at ${envFile}${inlineCommentHint(settings.settings)}`,
      { cause: error },
    );
  }

  const variables = parseDotenv(envSource);
  let environment: EnvironmentVariables;
  try {
    environment = validateEnvironmentVariables(variables);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`${envFile}: ${reason}`, { cause: error });
  }

  return {
    file,
    rootDir,
    settings,
    envFile,
    variables,
    environment,
    runnerOptions,
  };
}

function readRunnerOptions(file: string, settings: TestSettings): RunnerOptions {
  try {
    return parseRunnerOptions(settings.options ?? '');
  } catch (error) {
    if (error instanceof UnsupportedRunnerOptionError) {
      throw new SettingsError(`${file}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

export function parseTestSettings(file: string, source: string): TestSettings {
  let section: Record<string, string> | undefined;
  try {
    section = parseIni(source)[TEST_SETTINGS_SECTION];
  } catch (error) {
    if (error instanceof IniParseError) {
      throw new SettingsError(`${file}: ${error.message}`, { cause: error });
    }
    throw error;
  }

  if (!section) {
    throw new SettingsError(
      `${file}: missing [${TEST_SETTINGS_SECTION}] section`,
    );
  }

  const settings = plainToInstance(TestSettings, section);
  const errors = validateSync(settings, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (errors.length > 0) {
    throw new SettingsError(
      `${file}: invalid [${TEST_SETTINGS_SECTION}] section\n${formatValidationIssues(flattenValidationErrors(errors))}`,
    );
  }

  return settings;
}
