import { Command } from 'commander';
import { checkTestSettings } from '../../tooling/settings/check-settings';
import { runCommand } from '../run-command';

export const DEFAULT_SETTINGS_FILE = 'catalog.ini';

export function createCheckConfigCommand(): Command {
  return new Command('check-config')
    .description('Validate catalog.ini and the test files it selects')
    .argument('[file]', 'INI file to check', DEFAULT_SETTINGS_FILE)
    .action((file: string) =>
      runCommand(async () => {
        const { loaded, testFiles } = await checkTestSettings(file);

        console.log(
          `Settings: ${loaded.envFile} (NODE_ENV=${loaded.environment.NODE_ENV})`,
        );
        console.log(
          `Discovered ${testFiles.length} test file(s) matching "${loaded.settings.match}"`,
        );
        if (loaded.settings.options) {
          console.log(
            `Runner options: ${loaded.settings.options} -> ${JSON.stringify(loaded.runnerOptions)}`,
          );
        }
      }),
    );
}
