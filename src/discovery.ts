import fs from 'node:fs/promises';
import path from 'node:path';

export const DEFAULT_CONFIG_FILES = ['dao-generator.config.json', '.dao-generator.json', 'config/dao-generator.json'];

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

/** Returns the first default configuration file present under `rootDir`. */
export async function discoverConfigFile(rootDir: string): Promise<string | null> {
  const absoluteRoot = path.resolve(rootDir);
  for (const candidate of DEFAULT_CONFIG_FILES) {
    const absolute = path.join(absoluteRoot, candidate);
    if (await pathExists(absolute)) {
      return absolute;
    }
  }
  return null;
}
