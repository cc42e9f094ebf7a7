import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export const CONFIG_PATH = './.docsift.json';

// Expand tilde (~) to home directory
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Raw settings overrides from the config file; {} when there is none
 */
export async function loadConfig(
  configPath: string = CONFIG_PATH
): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${configPath} must contain a JSON object`);
  }
  return { ...parsed };
}

export async function saveConfig(
  config: Record<string, unknown>,
  configPath: string = CONFIG_PATH
): Promise<void> {
  const dir = path.dirname(configPath);
  if (dir !== '.' && dir !== '') {
    await fs.mkdir(dir, { recursive: true });
  }
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n');
}

/**
 * Interprets a `--set` value: JSON when it parses, a plain string otherwise
 */
export function parseConfigValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
