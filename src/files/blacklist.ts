/**
 * Blacklist of source paths that are never translated.
 *
 * One pattern per line; blank lines and `#` comments are ignored. A pattern
 * ending in `/` excludes every path under that directory, any other pattern
 * excludes exactly that path.
 */

import * as fs from 'fs';
import { errorCode } from '../core/errors';
import { log } from '../logging/logger';

function normalize(relativePath: string): string {
  return relativePath.replace(/\\/g, '/').replace(/^\.\//, '');
}

export function parseBlacklist(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .map(normalize);
}

/**
 * Read a blacklist file. A missing file means nothing is blacklisted.
 */
export async function loadBlacklist(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      log(`[Blacklist] ${filePath} not found, nothing is blacklisted`);
      return [];
    }
    throw error;
  }

  const patterns = parseBlacklist(content);
  log(`[Blacklist] Loaded ${patterns.length} patterns from ${filePath}`);
  return patterns;
}

export function isBlacklisted(relativePath: string, patterns: string[]): boolean {
  const candidate = normalize(relativePath);
  return patterns.some(pattern =>
    pattern.endsWith('/') ? candidate.startsWith(pattern) : candidate === pattern
  );
}
