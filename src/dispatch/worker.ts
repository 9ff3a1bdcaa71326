import { TranslationProgressEvent } from '../core/types';
import { TranslationContext } from '../dify/translator';
import { log } from '../logging/logger';

/** Streamed fragments between two chunk progress lines */
const CHUNK_LOG_INTERVAL = 200;

export interface WorkerProgressSnapshot {
  workerId: number;
  assigned: number;
  completed: number;
  failed: number;
  currentFile: string | null;
  turn: number;
  chunks: number;
}

/**
 * Progress state of one worker.
 *
 * Created by the scheduler for a single worker lane and handed to each
 * translation call that lane makes. Nothing else reads or writes it, so two
 * workers never share display state.
 */
export class WorkerContext implements TranslationContext {
  readonly workerId: number;
  /** Files assigned to this worker at dispatch time */
  readonly assigned: number;
  private completed = 0;
  private failed = 0;
  private currentFile: string | null = null;
  private turn = 0;
  private chunks = 0;

  constructor(workerId: number, assigned: number) {
    this.workerId = workerId;
    this.assigned = assigned;
  }

  get label(): string {
    return `worker ${this.workerId}`;
  }

  private get position(): string {
    return `${this.completed + this.failed + 1}/${this.assigned}`;
  }

  beginFile(relativePath: string): void {
    this.currentFile = relativePath;
    this.turn = 0;
    this.chunks = 0;
    log(`[${this.label}] (${this.position}) Translating ${relativePath}`);
  }

  endFile(success: boolean): void {
    if (success) {
      this.completed++;
    } else {
      this.failed++;
    }
    this.currentFile = null;
  }

  readonly onProgress = (event: TranslationProgressEvent): void => {
    switch (event.type) {
      case 'turn-start':
        this.turn = event.turn;
        if (event.turn > 1) {
          log(`[${this.label}] ${this.currentFile}: continuation turn ${event.turn}`);
        }
        break;
      case 'chunk':
        this.chunks++;
        if (event.chunks % CHUNK_LOG_INTERVAL === 0) {
          log(`[${this.label}] ${this.currentFile}: turn ${event.turn}, ${event.chunks} chunks, ${event.characters} chars`);
        }
        break;
      case 'turn-end':
        log(
          `[${this.label}] ${this.currentFile}: turn ${event.turn} finished ` +
          `(${event.completionTokens} completion tokens${event.truncated ? ', truncated' : ''})`
        );
        break;
    }
  };

  snapshot(): WorkerProgressSnapshot {
    return {
      workerId: this.workerId,
      assigned: this.assigned,
      completed: this.completed,
      failed: this.failed,
      currentFile: this.currentFile,
      turn: this.turn,
      chunks: this.chunks,
    };
  }
}
