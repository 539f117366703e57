import * as fs from 'fs';
import * as path from 'path';
import { ServiceContainer } from '../../src/services';

/**
 * Services rooted in a scratch directory, isolated from process.env
 *
 * @param settings - written to the settings file before loading
 */
export function createTestServices(dir: string, settings?: Record<string, unknown>): ServiceContainer {
  const settingsFile = path.join(dir, 'settings.json');
  if (settings) {
    fs.writeFileSync(settingsFile, JSON.stringify(settings));
  }

  return new ServiceContainer({
    settingsFile,
    backupDir: path.join(dir, 'backups'),
    knowledgeFile: path.join(dir, 'knowledge.json'),
    env: {},
    random: () => 0,
  });
}
