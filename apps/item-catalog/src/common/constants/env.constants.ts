export enum NodeEnvironment {
  Development = 'development',
  Test = 'test',
  Production = 'production',
}

export const DEFAULT_AWS_REGION = 'eu-central-1';
