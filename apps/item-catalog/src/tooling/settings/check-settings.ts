import { discoverTestFiles } from './test-discovery';
import { LoadedTestSettings, loadTestSettings } from './test-settings';

export interface SettingsCheck {
  loaded: LoadedTestSettings;
  testFiles: string[];
}

/**
 * Loads `catalog.ini`, validates the env file it points at and makes sure
 * its `match` glob finds at least one test file.
 */
export async function checkTestSettings(file: string): Promise<SettingsCheck> {
  const loaded = await loadTestSettings(file);
  const testFiles = await discoverTestFiles(
    loaded.rootDir,
    loaded.settings.match,
  );

  return { loaded, testFiles };
}
