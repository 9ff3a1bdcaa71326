/**
 * Dispatch Scheduler
 *
 * Filters candidate files down to the eligible ones, deals them out to a
 * fixed number of workers round-robin, and runs the workers concurrently.
 * Each worker translates its own files strictly in assignment order; a
 * failed file is counted and the worker moves on.
 *
 * The partition is static: a worker that finishes early does not take
 * files from a slower one.
 */

import { ConfigurationError } from '../core/errors';
import { Usage, addUsage, emptyUsage } from '../core/types';
import { isBlacklisted } from '../files/blacklist';
import { ChangeLedger } from '../ledger/store';
import { log, errorMessage } from '../logging/logger';
import { FileTranslator, TextTranslator } from './fileTranslator';
import { WorkerContext } from './worker';

export interface SchedulerOptions {
  translator: TextTranslator;
  /** Long-lived ledger, incremental across runs */
  ledger: ChangeLedger;
  /** Per-run ledger recording only what this run translated */
  runLedger?: ChangeLedger;
  sourceRoot: string;
  targetRoot: string;
  targetLanguage: string;
  workers: number;
  blacklist?: string[];
}

/**
 * One file paired with the worker that owns it. Fixed for the whole run.
 */
export interface WorkAssignment {
  readonly path: string;
  readonly workerId: number;
  /** Position within the worker's list, from 0 */
  readonly index: number;
  /** Length of the worker's list */
  readonly total: number;
}

export interface FileFailure {
  path: string;
  error: string;
}

export interface EligibilityResult {
  eligible: string[];
  /** Unchanged since the last successful translation */
  upToDate: string[];
  blacklisted: string[];
  /** Sources that could not be read while checking */
  failures: FileFailure[];
}

export interface RunSummary {
  succeeded: number;
  failed: number;
  upToDate: number;
  blacklisted: number;
  failures: FileFailure[];
  /** Usage summed over every successful file */
  usage: Usage;
}

/**
 * Deal files to workers by index modulo the worker count
 */
export function partition(files: string[], workers: number): WorkAssignment[][] {
  const lanes: string[][] = Array.from({ length: workers }, () => []);
  files.forEach((file, i) => lanes[i % workers].push(file));

  return lanes.map((lane, workerId) =>
    lane.map((file, index) => ({ path: file, workerId, index, total: lane.length }))
  );
}

export class DispatchScheduler {
  private readonly options: SchedulerOptions;
  private readonly fileTranslator: FileTranslator;

  constructor(options: SchedulerOptions) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new ConfigurationError(`Worker count must be a positive integer, got ${options.workers}`);
    }
    this.options = options;
    this.fileTranslator = new FileTranslator(
      options.translator,
      options.sourceRoot,
      options.targetRoot,
      options.targetLanguage
    );
  }

  /**
   * Keep files that are not blacklisted and whose ledger record is missing
   * or stale
   */
  async selectEligible(candidates: string[]): Promise<EligibilityResult> {
    const result: EligibilityResult = { eligible: [], upToDate: [], blacklisted: [], failures: [] };
    const blacklist = this.options.blacklist ?? [];

    for (const file of candidates) {
      if (isBlacklisted(file, blacklist)) {
        result.blacklisted.push(file);
        continue;
      }

      try {
        if (await this.options.ledger.needsTranslation(file)) {
          result.eligible.push(file);
        } else {
          result.upToDate.push(file);
        }
      } catch (error) {
        log(`[Scheduler] Cannot check ${file}: ${errorMessage(error)}`);
        result.failures.push({ path: file, error: errorMessage(error) });
      }
    }

    return result;
  }

  /**
   * Translate every eligible candidate and report the counts
   */
  async run(candidates: string[]): Promise<RunSummary> {
    const selection = await this.selectEligible(candidates);
    const lanes = partition(selection.eligible, this.options.workers).filter(lane => lane.length > 0);

    log(
      `[Scheduler] ${selection.eligible.length} to translate, ${selection.upToDate.length} up to date, ` +
      `${selection.blacklisted.length} blacklisted, ${lanes.length} workers`
    );

    const summary: RunSummary = {
      succeeded: 0,
      failed: selection.failures.length,
      upToDate: selection.upToDate.length,
      blacklisted: selection.blacklisted.length,
      failures: [...selection.failures],
      usage: emptyUsage(),
    };

    await Promise.all(lanes.map(lane => this.runWorker(lane, summary)));

    log(`[Scheduler] Finished: ${summary.succeeded} succeeded, ${summary.failed} failed`);
    return summary;
  }

  private async runWorker(lane: WorkAssignment[], summary: RunSummary): Promise<void> {
    const context = new WorkerContext(lane[0].workerId, lane[0].total);

    for (const assignment of lane) {
      const ok = await this.processFile(assignment, context, summary);
      context.endFile(ok);
    }
  }

  /**
   * Translate one file and record it in both ledgers. Never throws.
   */
  private async processFile(
    assignment: WorkAssignment,
    context: WorkerContext,
    summary: RunSummary
  ): Promise<boolean> {
    context.beginFile(assignment.path);

    const result = await this.fileTranslator.translateFile(assignment.path, context);
    if (!result.ok) {
      log(`[${context.label}] Error translating ${assignment.path}: ${result.error.message}`);
      summary.failed++;
      summary.failures.push({ path: assignment.path, error: result.error.message });
      return false;
    }

    const { usage, turns, durationMs } = result.output.metadata;
    try {
      await this.options.ledger.recordSuccess(assignment.path, usage);
      await this.options.runLedger?.recordSuccess(assignment.path, usage);
    } catch (error) {
      log(`[${context.label}] Translated ${assignment.path} but could not record it: ${errorMessage(error)}`);
      summary.failed++;
      summary.failures.push({ path: assignment.path, error: errorMessage(error) });
      return false;
    }

    log(
      `[${context.label}] Translated ${assignment.path} in ${turns} turn(s), ${durationMs}ms, ` +
      `${usage.totalTokens} tokens`
    );
    summary.succeeded++;
    summary.usage = addUsage(summary.usage, usage);
    return true;
  }
}
