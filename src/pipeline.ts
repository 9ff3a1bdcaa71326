/**
 * Translation Run
 *
 * One pass over the source tree: mirror resources, scan translatable files,
 * dispatch the changed ones to workers, and record successes in the
 * long-lived ledger and in a per-run ledger that starts empty every time.
 */

import * as path from 'path';
import { Settings, ledgerPaths } from './config/settings';
import { DifyTranslator, FetchLike } from './dify';
import { DispatchScheduler, RunSummary, TextTranslator } from './dispatch';
import { getTranslatableFiles, loadBlacklist, mirrorResources, MirrorResult, nestedDirectoryIgnore } from './files';
import { ChangeLedger } from './ledger';
import { log } from './logging/logger';

export interface PipelineDependencies {
  /** Replaces the chat-messages translator entirely */
  translator?: TextTranslator;
  /** HTTP override passed to the default translator */
  fetch?: FetchLike;
  /** Clock for ledger timestamps */
  now?: () => Date;
}

export interface PipelineResult extends RunSummary {
  candidates: number;
  resources: MirrorResult;
}

/**
 * Relative POSIX path of `file` if it lies inside `root`, else null
 */
function relativeInside(root: string, file: string | null): string | null {
  if (!file) {
    return null;
  }
  const relative = path.relative(root, file);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return relative.split(path.sep).join('/');
}

export function createTranslator(settings: Settings, fetchImpl?: FetchLike): DifyTranslator {
  return new DifyTranslator({
    apiUrl: settings.apiUrl,
    apiKey: settings.apiKey,
    user: settings.user,
    responseMode: settings.responseMode,
    query: settings.query,
    continueQuery: settings.continueQuery,
    maxOutputTokens: settings.maxOutputTokens,
    maxTurns: settings.maxTurns,
    fetch: fetchImpl,
  });
}

export async function runPipeline(settings: Settings, deps: PipelineDependencies = {}): Promise<PipelineResult> {
  // Built first so a missing credential aborts before any file is touched
  const translator = deps.translator ?? createTranslator(settings, deps.fetch);

  const paths = ledgerPaths(settings);
  const ledgerOptions = { sourceRoot: settings.source, targetLanguage: settings.targetLanguage, now: deps.now };
  const ledger = new ChangeLedger(paths.ledger, ledgerOptions);
  const runLedger = new ChangeLedger(paths.runLedger, ledgerOptions);
  await runLedger.clear();

  const blacklist = settings.blacklist ? await loadBlacklist(settings.blacklist) : [];

  // Bookkeeping files that live in the source tree are neither translated nor mirrored
  const internal = [
    paths.ledger,
    paths.runLedger,
    `${paths.ledger}.tmp`,
    `${paths.runLedger}.tmp`,
    settings.blacklist,
    settings.logFile,
  ]
    .map(file => relativeInside(settings.source, file))
    .filter((file): file is string => file !== null);

  const targetIgnore = nestedDirectoryIgnore(settings.source, settings.target);
  const ignore = targetIgnore ? [targetIgnore] : [];

  const resources = await mirrorResources(settings.source, settings.target, {
    extensions: settings.extensions,
    exclude: internal,
    ignore,
  });

  const candidates = (await getTranslatableFiles(settings.source, settings.extensions, { ignore }))
    .filter(file => !internal.includes(file));
  log(`[Pipeline] Found ${candidates.length} translatable files under ${settings.source}`);

  const scheduler = new DispatchScheduler({
    translator,
    ledger,
    runLedger,
    sourceRoot: settings.source,
    targetRoot: settings.target,
    targetLanguage: settings.targetLanguage,
    workers: settings.workers,
    blacklist,
  });

  const summary = await scheduler.run(candidates);
  return { ...summary, candidates: candidates.length, resources };
}

/**
 * Human-readable end-of-run summary
 */
export function formatSummary(result: PipelineResult): string {
  const lines = [
    'Translation completed!',
    `Success: ${result.succeeded} files`,
    `Failed: ${result.failed} files`,
    `Up to date: ${result.upToDate} files`,
    `Blacklisted: ${result.blacklisted} files`,
    `Resources copied: ${result.resources.copied.length} files`,
    `Tokens used: ${result.usage.totalTokens}`,
  ];
  if (result.usage.totalPrice > 0) {
    lines.push(`Cost: ${result.usage.totalPrice.toFixed(6)}${result.usage.currency ? ` ${result.usage.currency}` : ''}`);
  }
  for (const failure of result.failures) {
    lines.push(`  ✗ ${failure.path}: ${failure.error}`);
  }
  return lines.join('\n');
}
