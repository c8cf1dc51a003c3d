import { NodeEnvironment } from '../constants/env.constants';
import { validateEnvironmentVariables } from './validation';

describe('validateEnvironmentVariables', () => {
  it('should accept a complete environment', () => {
    const env = validateEnvironmentVariables({
      NODE_ENV: 'test',
      TABLE_PREFIX: 'test_',
      AWS_REGION: 'eu-central-1',
      DYNAMODB_ENDPOINT: 'http://localhost:8000',
    });

    expect(env.NODE_ENV).toBe(NodeEnvironment.Test);
    expect(env.TABLE_PREFIX).toBe('test_');
    expect(env.DYNAMODB_ENDPOINT).toBe('http://localhost:8000');
  });

  it('should only require NODE_ENV', () => {
    const env = validateEnvironmentVariables({ NODE_ENV: 'production' });

    expect(env.NODE_ENV).toBe(NodeEnvironment.Production);
    expect(env.TABLE_PREFIX).toBeUndefined();
  });

  it('should reject a missing NODE_ENV', () => {
    expect(() => validateEnvironmentVariables({})).toThrow(
      'NODE_ENV should not be null or undefined',
    );
  });

  it('should reject an unknown NODE_ENV', () => {
    expect(() => validateEnvironmentVariables({ NODE_ENV: 'staging' })).toThrow(
      'Invalid environment variables',
    );
  });

  it('should reject a table prefix with spaces', () => {
    expect(() =>
      validateEnvironmentVariables({
        NODE_ENV: 'test',
        TABLE_PREFIX: 'test_ # staging',
      }),
    ).toThrow('  - TABLE_PREFIX: TABLE_PREFIX may only contain letters');
  });
});
