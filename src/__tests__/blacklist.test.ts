/**
 * Tests for blacklist parsing and matching
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isBlacklisted, loadBlacklist, parseBlacklist } from '../files/blacklist';

describe('parseBlacklist', () => {
  it('should skip blank lines and comments', () => {
    const content = '# generated pages\n\nchangelog.md\n   \n# drafts\ndrafts/\n';

    expect(parseBlacklist(content)).toEqual(['changelog.md', 'drafts/']);
  });

  it('should trim lines and normalize separators', () => {
    expect(parseBlacklist('  ./guide\\legacy.md  \r\napi\\internal/\r\n')).toEqual([
      'guide/legacy.md',
      'api/internal/',
    ]);
  });
});

describe('isBlacklisted', () => {
  const patterns = ['drafts/', 'changelog.md'];

  it('should exclude everything under a directory pattern', () => {
    expect(isBlacklisted('drafts/a.md', patterns)).toBe(true);
    expect(isBlacklisted('drafts/deep/b.md', patterns)).toBe(true);
  });

  it('should not treat a directory pattern as a name prefix', () => {
    expect(isBlacklisted('drafts.md', patterns)).toBe(false);
  });

  it('should match file patterns exactly', () => {
    expect(isBlacklisted('changelog.md', patterns)).toBe(true);
    expect(isBlacklisted('guide/changelog.md', patterns)).toBe(false);
    expect(isBlacklisted('changelog.md.bak', patterns)).toBe(false);
  });

  it('should exclude nothing with no patterns', () => {
    expect(isBlacklisted('anything.md', [])).toBe(false);
  });
});

describe('loadBlacklist', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blacklist-test-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should read patterns from the file', async () => {
    const file = path.join(workDir, 'blacklist.txt');
    fs.writeFileSync(file, 'drafts/\n# note\nold.md\n');

    expect(await loadBlacklist(file)).toEqual(['drafts/', 'old.md']);
  });

  it('should return no patterns when the file is missing', async () => {
    expect(await loadBlacklist(path.join(workDir, 'missing.txt'))).toEqual([]);
  });
});
