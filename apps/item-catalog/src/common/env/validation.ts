import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  flattenValidationErrors,
  formatValidationIssues,
} from '../validation/validation-issues';
import { EnvironmentVariables } from './environment-variables';

/**
 * Used by ConfigModule to reject a bad environment before anything boots.
 */
export function validateEnvironmentVariables(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const issues = flattenValidationErrors(errors);
    throw new Error(
      `Invalid environment variables:\n${formatValidationIssues(issues)}`,
    );
  }

  return validatedConfig;
}
