/**
 * Resource Mirroring
 *
 * Copies every non-translatable file (images, stylesheets, config…) from the
 * source tree into the target tree. Files already present in the target are
 * never overwritten, even if the source copy changed.
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorCode } from '../core/errors';
import { log, errorMessage } from '../logging/logger';
import { DEFAULT_TRANSLATABLE_EXTENSIONS, isTranslatable, listSourceFiles } from './scan';

export interface MirrorOptions {
  extensions?: string[];
  /** Relative paths that must not be mirrored (ledgers, blacklist, log) */
  exclude?: string[];
  /** Glob patterns to skip while walking the source tree */
  ignore?: string[];
}

export interface MirrorResult {
  copied: string[];
  skipped: string[];
  failed: string[];
}

export async function mirrorResources(
  sourceRoot: string,
  targetRoot: string,
  options: MirrorOptions = {}
): Promise<MirrorResult> {
  const extensions = options.extensions ?? DEFAULT_TRANSLATABLE_EXTENSIONS;
  const excluded = new Set(options.exclude ?? []);
  const result: MirrorResult = { copied: [], skipped: [], failed: [] };

  const files = await listSourceFiles(sourceRoot, { ignore: options.ignore });

  for (const relativePath of files) {
    if (isTranslatable(relativePath, extensions) || excluded.has(relativePath)) {
      continue;
    }

    const targetFile = path.join(targetRoot, relativePath);
    if (fs.existsSync(targetFile)) {
      result.skipped.push(relativePath);
      continue;
    }

    try {
      await fs.promises.mkdir(path.dirname(targetFile), { recursive: true });
      // EXCL: a file that appeared since the existence check still wins
      await fs.promises.copyFile(
        path.join(sourceRoot, relativePath),
        targetFile,
        fs.constants.COPYFILE_EXCL
      );
      result.copied.push(relativePath);
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        result.skipped.push(relativePath);
      } else {
        log(`[Resources] Failed to copy ${relativePath}: ${errorMessage(error)}`);
        result.failed.push(relativePath);
      }
    }
  }

  log(`[Resources] Copied ${result.copied.length}, kept ${result.skipped.length} existing, ${result.failed.length} failed`);
  return result;
}
