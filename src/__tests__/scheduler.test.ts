/**
 * Tests for DispatchScheduler
 *
 * Uses FakeTranslator so dispatch behavior is tested without the HTTP client.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DispatchScheduler, SchedulerOptions, partition } from '../dispatch/scheduler';
import { WorkerContext } from '../dispatch/worker';
import { ChangeLedger } from '../ledger/store';
import { ConfigurationError } from '../core/errors';
import { FakeTranslator } from '../__mocks__/dify';

describe('partition', () => {
  it('should deal files round-robin by index', () => {
    const lanes = partition(['a.md', 'b.md', 'c.md', 'd.md', 'e.md'], 2);

    expect(lanes.map(lane => lane.map(assignment => assignment.path))).toEqual([
      ['a.md', 'c.md', 'e.md'],
      ['b.md', 'd.md'],
    ]);
    expect(lanes[0][2]).toEqual({ path: 'e.md', workerId: 0, index: 2, total: 3 });
  });

  it('should leave surplus workers with nothing', () => {
    const lanes = partition(['only.md'], 3);

    expect(lanes.map(lane => lane.length)).toEqual([1, 0, 0]);
  });
});

describe('WorkerContext', () => {
  it('should count finished files and track the current one', () => {
    const context = new WorkerContext(1, 2);

    context.beginFile('a.md');
    context.onProgress({ type: 'turn-start', turn: 1, conversationId: '' });
    context.onProgress({ type: 'chunk', turn: 1, chunks: 1, characters: 4 });
    const during = context.snapshot();
    context.endFile(true);

    expect(context.label).toBe('worker 1');
    expect(during).toEqual({
      workerId: 1,
      assigned: 2,
      completed: 0,
      failed: 0,
      currentFile: 'a.md',
      turn: 1,
      chunks: 1,
    });
    expect(context.snapshot()).toMatchObject({ completed: 1, failed: 0, currentFile: null });
  });
});

describe('DispatchScheduler', () => {
  let workDir: string;
  let sourceRoot: string;
  let targetRoot: string;
  let translator: FakeTranslator;
  let ledger: ChangeLedger;

  const writeSource = (relativePath: string, content: string): void => {
    const file = path.join(sourceRoot, relativePath);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf-8');
  };

  const createScheduler = (overrides: Partial<SchedulerOptions> = {}): DispatchScheduler =>
    new DispatchScheduler({
      translator,
      ledger,
      sourceRoot,
      targetRoot,
      targetLanguage: 'de',
      workers: 2,
      ...overrides,
    });

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scheduler-test-'));
    sourceRoot = path.join(workDir, 'docs');
    targetRoot = path.join(workDir, 'docs-de');
    fs.mkdirSync(sourceRoot, { recursive: true });
    translator = new FakeTranslator();
    ledger = new ChangeLedger(path.join(workDir, 'metadata.json'), { sourceRoot, targetLanguage: 'de' });

    writeSource('a.md', 'Alpha');
    writeSource('b.md', 'Beta FAIL');
    writeSource('c.md', 'Gamma');
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should reject a worker count below one', () => {
    expect(() => createScheduler({ workers: 0 })).toThrow(ConfigurationError);
  });

  it('should isolate a failed file from the rest of the run', async () => {
    const summary = await createScheduler().run(['a.md', 'b.md', 'c.md']);

    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([{ path: 'b.md', error: 'refused: Beta FAIL' }]);
    expect(summary.usage.totalTokens).toBe('Alpha'.length + 'Gamma'.length);

    expect(fs.readFileSync(path.join(targetRoot, 'a.md'), 'utf-8')).toBe('[de] Alpha');
    expect(fs.readFileSync(path.join(targetRoot, 'c.md'), 'utf-8')).toBe('[de] Gamma');
    expect(fs.existsSync(path.join(targetRoot, 'b.md'))).toBe(false);

    expect(ledger.paths().sort()).toEqual(['a.md', 'c.md']);
  });

  it('should retry only the failed file on the next run', async () => {
    await createScheduler().run(['a.md', 'b.md', 'c.md']);
    translator.seen.length = 0;

    const summary = await createScheduler().run(['a.md', 'b.md', 'c.md']);

    expect(translator.seen).toEqual(['Beta FAIL']);
    expect(summary.upToDate).toBe(2);
    expect(summary.failed).toBe(1);
  });

  it('should translate each worker\'s files in assignment order', async () => {
    writeSource('d.md', 'Delta');
    writeSource('e.md', 'Epsilon');

    await createScheduler({ workers: 1 }).run(['a.md', 'c.md', 'd.md', 'e.md']);

    expect(translator.seen).toEqual(['Alpha', 'Gamma', 'Delta', 'Epsilon']);
  });

  it('should give each worker its own context', async () => {
    await createScheduler({ workers: 3 }).run(['a.md', 'c.md']);

    expect([...translator.labels].sort()).toEqual(['worker 0', 'worker 1']);
  });

  it('should skip blacklisted files', async () => {
    writeSource('drafts/wip.md', 'Draft');

    const summary = await createScheduler({ blacklist: ['drafts/', 'b.md'] }).run(['a.md', 'b.md', 'c.md', 'drafts/wip.md']);

    expect(summary.blacklisted).toBe(2);
    expect(summary.failed).toBe(0);
    expect(translator.seen.sort()).toEqual(['Alpha', 'Gamma']);
  });

  it('should count an unreadable source as a failure', async () => {
    const summary = await createScheduler().run(['a.md', 'missing.md', 'c.md']);

    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.failures[0].path).toBe('missing.md');
    expect(summary.failures[0].error).toContain('Cannot read source file');
  });

  it('should record successes in the run ledger as well', async () => {
    const runLedger = new ChangeLedger(path.join(workDir, 'metadata.run.json'), { sourceRoot, targetLanguage: 'de' });

    await createScheduler({ runLedger }).run(['a.md', 'b.md', 'c.md']);

    expect(runLedger.paths().sort()).toEqual(['a.md', 'c.md']);
  });
});
