import { glob } from 'glob';
import { inlineCommentHint } from './inline-comment';

const IGNORED = ['**/node_modules/**', '**/dist/**', '**/coverage/**'];

export class NoTestsDiscoveredError extends Error {
  constructor(readonly pattern: string) {
    super(
      `no tests ran: no files matching "${pattern}"${inlineCommentHint(pattern)}`,
    );
    this.name = 'NoTestsDiscoveredError';
  }
}

/**
 * Test files under `rootDir` matching `pattern`, as sorted relative paths.
 * @throws NoTestsDiscoveredError when nothing matches
 */
export async function discoverTestFiles(
  rootDir: string,
  pattern: string,
): Promise<string[]> {
  const files = await glob(pattern, {
    cwd: rootDir,
    ignore: IGNORED,
    nodir: true,
    posix: true,
  });

  if (files.length === 0) {
    throw new NoTestsDiscoveredError(pattern);
  }

  return files.sort();
}
