export {
  DEFAULT_TRANSLATABLE_EXTENSIONS,
  getTranslatableFiles,
  listSourceFiles,
  isTranslatable,
  nestedDirectoryIgnore,
} from './scan';
export type { ScanOptions } from './scan';
export { parseBlacklist, loadBlacklist, isBlacklisted } from './blacklist';
export { mirrorResources } from './resources';
export type { MirrorOptions, MirrorResult } from './resources';
