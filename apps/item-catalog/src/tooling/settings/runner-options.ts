import { inlineCommentHint } from './inline-comment';

/** Jest settings an `options` line can switch on */
export interface RunnerOptions {
  maxWorkers?: number;
  ci?: boolean;
  bail?: number;
  verbose?: boolean;
  silent?: boolean;
}

const RUNNER_FLAGS = new Map<string, RunnerOptions>([
  ['--runInBand', { maxWorkers: 1 }],
  ['-i', { maxWorkers: 1 }],
  ['--ci', { ci: true }],
  ['--bail', { bail: 1 }],
  ['--verbose', { verbose: true }],
  ['--silent', { silent: true }],
]);

export class UnsupportedRunnerOptionError extends Error {
  constructor(readonly option: string, message: string) {
    super(message);
    this.name = 'UnsupportedRunnerOptionError';
  }
}

/**
 * Maps the whitespace-separated flags of an `options` value onto Jest
 * configuration. Flags outside the supported set are rejected.
 */
export function parseRunnerOptions(options: string): RunnerOptions {
  return options
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .reduce<RunnerOptions>((parsed, token) => {
      const flag = RUNNER_FLAGS.get(token);
      if (!flag) {
        throw new UnsupportedRunnerOptionError(
          token,
          `unsupported runner option "${token}"${inlineCommentHint(options)}`,
        );
      }
      return { ...parsed, ...flag };
    }, {});
}
