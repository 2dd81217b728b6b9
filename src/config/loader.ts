import { readdir, readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse, YAMLParseError } from 'yaml';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Unvalidated tool entry and the file it came from
 */
export interface RawToolEntry {
  source: string;
  definition: unknown;
}

const TOOL_FILE_PATTERN = /\.ya?ml$/;

/**
 * Discover tool definition files, sorted by name
 *
 * @throws ConfigurationError when the directory does not exist
 */
export async function discoverToolFiles(dir: string): Promise<string[]> {
  if (!existsSync(dir)) {
    throw new ConfigurationError(`Tools config directory not found: ${dir}`);
  }

  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && TOOL_FILE_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Parse one tool file; each file must hold a `tools` array
 * Returns an empty list (and logs why) for files that cannot be used
 */
export function parseToolFile(source: string, content: string): RawToolEntry[] {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      logger.error('YAML error in tool file', { file: source, error: error.message });
      return [];
    }
    throw error;
  }

  if (document === null || document === undefined) {
    logger.warn('Empty tool file', { file: source });
    return [];
  }

  if (typeof document !== 'object' || !('tools' in document) || !Array.isArray(document.tools)) {
    logger.error("Missing 'tools' array", { file: source });
    return [];
  }

  const tools: unknown[] = document.tools;
  return tools.map((definition) => ({ source, definition }));
}

/**
 * Read every tool file in a directory
 *
 * Unreadable or malformed files are skipped so one bad file cannot block the rest.
 * @throws ConfigurationError when the directory does not exist
 */
export async function loadToolEntries(dir: string): Promise<RawToolEntry[]> {
  const files = await discoverToolFiles(dir);
  const entries: RawToolEntry[] = [];

  for (const file of files) {
    try {
      const content = await readFile(file, 'utf-8');
      entries.push(...parseToolFile(file, content));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Failed to read tool file', { file, error: message });
    }
  }

  logger.debug('Tool files read', { files: files.length, entries: entries.length });
  return entries;
}
