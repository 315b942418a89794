/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'event-scout.config.json',
  '.eventscoutrc.json',
  '.eventscoutrc',
];

function formatIssues(error: { errors: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

function readPackageSection(content: string): unknown {
  const parsed: unknown = JSON.parse(content);
  if (parsed !== null && typeof parsed === 'object' && 'eventScout' in parsed) {
    return parsed.eventScout;
  }
  return undefined;
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    // package.json may carry an eventScout key
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      let section: unknown;
      try {
        section = readPackageSection(await fs.promises.readFile(packagePath, 'utf-8'));
      } catch {
        // A broken package.json is not ours to report
        section = undefined;
      }
      if (section !== undefined) {
        const result = configSchema.safeParse(section);
        if (result.success) {
          return result.data;
        }
        console.warn(`Ignoring invalid eventScout section in ${packagePath}:\n${formatIssues(result.error)}`);
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}
