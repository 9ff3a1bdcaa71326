import * as path from 'path';
import { glob } from 'glob';

/** Extensions translated by default; everything else is mirrored as-is */
export const DEFAULT_TRANSLATABLE_EXTENSIONS = ['.md', '.pages'];

/** Never walked, whatever the source tree holds */
const ALWAYS_IGNORED = ['**/.git/**', '**/node_modules/**'];

export interface ScanOptions {
  /** Extra glob patterns to skip, relative to the source root */
  ignore?: string[];
}

/**
 * Check a relative path's extension against the translatable set. The match
 * is exact: `README.MD` is not a `.md` file and gets mirrored.
 */
export function isTranslatable(relativePath: string, extensions: string[] = DEFAULT_TRANSLATABLE_EXTENSIONS): boolean {
  return extensions.includes(path.posix.extname(relativePath));
}

/**
 * Glob pattern excluding `inner` when it lives inside `root`, e.g. a target
 * tree nested in the source tree. Returns null otherwise.
 */
export function nestedDirectoryIgnore(root: string, inner: string): string | null {
  const relative = path.relative(path.resolve(root), path.resolve(inner));
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return `${relative.split(path.sep).join('/')}/**`;
}

/**
 * All files under the source root, as sorted relative POSIX paths
 */
export async function listSourceFiles(sourceRoot: string, options: ScanOptions = {}): Promise<string[]> {
  const files = await glob('**/*', {
    cwd: sourceRoot,
    nodir: true,
    dot: true,
    posix: true,
    ignore: [...ALWAYS_IGNORED, ...(options.ignore ?? [])],
  });
  return files.sort();
}

/**
 * Translatable files under the source root, as sorted relative POSIX paths
 */
export async function getTranslatableFiles(
  sourceRoot: string,
  extensions: string[] = DEFAULT_TRANSLATABLE_EXTENSIONS,
  options: ScanOptions = {}
): Promise<string[]> {
  const files = await listSourceFiles(sourceRoot, options);
  return files.filter(file => isTranslatable(file, extensions));
}
