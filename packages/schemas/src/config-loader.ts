import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@scholar/shared/src/utils/errors.js';
import { validateResearchConfig } from './validators.js';
import type { ResearchConfig } from './research-config.schema.js';

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }
}

/**
 * Loads research settings from a JSON file. Without a path, every setting
 * takes its schema default.
 */
export async function loadResearchConfig(configPath?: string): Promise<ResearchConfig> {
  if (!configPath) {
    return validateResearchConfig({});
  }

  const raw = await readJsonFile(configPath);
  return validateResearchConfig(raw);
}
