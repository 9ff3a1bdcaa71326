/**
 * End-to-end tests for a translation run over a temp source tree
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PipelineResult, formatSummary, runPipeline } from '../pipeline';
import { Settings } from '../config/settings';
import { ConfigurationError } from '../core/errors';
import { emptyUsage } from '../core/types';
import { FakeTranslator, MockChatService, streamTurn } from '../__mocks__/dify';

describe('runPipeline', () => {
  let workDir: string;
  let settings: Settings;
  let translator: FakeTranslator;

  const writeSource = (relativePath: string, content: string): void => {
    const file = path.join(settings.source, relativePath);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf-8');
  };

  const readJson = (file: string): unknown => JSON.parse(fs.readFileSync(file, 'utf-8'));

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-test-'));
    const source = path.join(workDir, 'docs');
    settings = {
      source,
      target: path.join(workDir, 'docs-de'),
      targetLanguage: 'de',
      apiKey: 'test-key',
      apiUrl: 'https://chat.example.test/v1/chat-messages',
      user: 'tester',
      query: 'Please translate.',
      continueQuery: 'Please continue.',
      responseMode: 'streaming',
      workers: 2,
      maxOutputTokens: 4096,
      maxTurns: 20,
      blacklist: null,
      stateDir: source,
      logFile: null,
      extensions: ['.md', '.pages'],
    };
    translator = new FakeTranslator();

    writeSource('intro.md', 'Hello');
    writeSource('guide/setup.md', 'Setup');
    writeSource('images/logo.png', 'PNG');
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should translate documents and mirror resources', async () => {
    const result = await runPipeline(settings, { translator });

    expect(result.candidates).toBe(2);
    expect(result.succeeded).toBe(2);
    expect(result.resources.copied).toEqual(['images/logo.png']);
    expect(fs.readFileSync(path.join(settings.target, 'intro.md'), 'utf-8')).toBe('[de] Hello');
    expect(fs.readFileSync(path.join(settings.target, 'guide/setup.md'), 'utf-8')).toBe('[de] Setup');
  });

  it('should keep ledgers out of the translated and mirrored output', async () => {
    await runPipeline(settings, { translator });
    await runPipeline(settings, { translator });

    expect(fs.existsSync(path.join(settings.source, 'metadata.json'))).toBe(true);
    expect(fs.existsSync(path.join(settings.target, 'metadata.json'))).toBe(false);
    expect(fs.existsSync(path.join(settings.target, 'metadata.run.json'))).toBe(false);
  });

  it('should do nothing on a second run over an unchanged tree', async () => {
    await runPipeline(settings, { translator });

    const second = await runPipeline(settings, { translator });

    expect(second.succeeded).toBe(0);
    expect(second.upToDate).toBe(2);
    expect(translator.seen).toHaveLength(2);
  });

  it('should retranslate only the file that changed', async () => {
    await runPipeline(settings, { translator });
    writeSource('intro.md', 'Hello again');
    translator.seen.length = 0;

    const second = await runPipeline(settings, { translator });

    expect(translator.seen).toEqual(['Hello again']);
    expect(second.succeeded).toBe(1);
    expect(second.upToDate).toBe(1);
  });

  it('should retranslate everything for a new target language', async () => {
    await runPipeline(settings, { translator });
    translator.seen.length = 0;

    const second = await runPipeline({ ...settings, targetLanguage: 'fr' }, { translator });

    expect(second.succeeded).toBe(2);
    expect(fs.readFileSync(path.join(settings.target, 'intro.md'), 'utf-8')).toBe('[fr] Hello');
  });

  it('should start the run ledger empty on every run', async () => {
    const runLedger = path.join(settings.source, 'metadata.run.json');

    await runPipeline(settings, { translator });
    expect(Object.keys(Object(readJson(runLedger))).sort()).toEqual(['guide/setup.md', 'intro.md']);

    await runPipeline(settings, { translator });
    expect(readJson(runLedger)).toEqual({});
  });

  it('should honor a blacklist file kept in the source tree', async () => {
    writeSource('drafts/wip.md', 'Draft');
    writeSource('blacklist.txt', '# not ready\ndrafts/\n');

    const result = await runPipeline({ ...settings, blacklist: path.join(settings.source, 'blacklist.txt') }, { translator });

    expect(result.blacklisted).toBe(1);
    expect(result.succeeded).toBe(2);
    expect(result.resources.copied).toEqual(['images/logo.png']);
    expect(fs.existsSync(path.join(settings.target, 'drafts/wip.md'))).toBe(false);
  });

  it('should not scan a target tree nested in the source', async () => {
    const nested = { ...settings, target: path.join(settings.source, 'out') };

    await runPipeline(nested, { translator });
    const second = await runPipeline(nested, { translator });

    expect(second.candidates).toBe(2);
    expect(second.succeeded).toBe(0);
  });

  it('should keep ledgers in a separate state directory', async () => {
    const stateDir = path.join(workDir, 'state');

    await runPipeline({ ...settings, stateDir }, { translator });

    expect(fs.existsSync(path.join(stateDir, 'metadata.json'))).toBe(true);
    expect(fs.existsSync(path.join(settings.source, 'metadata.json'))).toBe(false);
  });

  it('should abort before touching files when the API key is missing', async () => {
    await expect(runPipeline({ ...settings, apiKey: '' })).rejects.toBeInstanceOf(ConfigurationError);

    expect(fs.existsSync(settings.target)).toBe(false);
  });

  it('should run through the chat-messages client', async () => {
    fs.rmSync(path.join(settings.source, 'guide'), { recursive: true });
    const service = new MockChatService().enqueue(streamTurn(['Hallo'], { completionTokens: 5 }));

    const result = await runPipeline({ ...settings, workers: 1 }, { fetch: service.fetch });

    expect(result.succeeded).toBe(1);
    expect(result.usage.totalTokens).toBe(15);
    expect(service.calls[0].inputs).toEqual({ target_language: 'de', input_content: 'Hello' });
    expect(fs.readFileSync(path.join(settings.target, 'intro.md'), 'utf-8')).toBe('Hallo');
    expect(readJson(path.join(settings.source, 'metadata.json'))).toMatchObject({
      'intro.md': { target_language: 'de', usage: { total_tokens: 15, currency: 'USD' } },
    });
  });
});

describe('formatSummary', () => {
  const result = (overrides: Partial<PipelineResult> = {}): PipelineResult => ({
    succeeded: 3,
    failed: 1,
    upToDate: 5,
    blacklisted: 2,
    failures: [{ path: 'broken.md', error: 'API error: quota exceeded' }],
    usage: { ...emptyUsage(), totalTokens: 1200 },
    candidates: 11,
    resources: { copied: ['logo.png'], skipped: [], failed: [] },
    ...overrides,
  });

  it('should list counts and failures', () => {
    expect(formatSummary(result()).split('\n')).toEqual([
      'Translation completed!',
      'Success: 3 files',
      'Failed: 1 files',
      'Up to date: 5 files',
      'Blacklisted: 2 files',
      'Resources copied: 1 files',
      'Tokens used: 1200',
      '  ✗ broken.md: API error: quota exceeded',
    ]);
  });

  it('should show cost when the service reported a price', () => {
    const summary = formatSummary(
      result({ failures: [], usage: { ...emptyUsage(), totalTokens: 10, totalPrice: 0.0125, currency: 'USD' } })
    );

    expect(summary.split('\n').pop()).toBe('Cost: 0.012500 USD');
  });
});
