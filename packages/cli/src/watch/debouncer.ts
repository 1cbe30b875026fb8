// packages/cli/src/watch/debouncer.ts — Coalescing debouncer for workflow file changes

export type ChangeKind = 'add' | 'change' | 'unlink';

export interface ChangeEvent {
  path: string;
  event: ChangeKind;
  ts: number;
}

export interface DebounceConfig {
  quietMs: number; // ms of quiet before flushing
  maxWaitMs: number; // max ms before forced flush
  maxBatchSize: number; // max distinct paths per batch
}

export interface ChangeBatch {
  /** Latest event per path, in first-seen order. */
  changes: ChangeEvent[];
  batchId: string;
  windowStart: number;
  windowEnd: number;
  reason: 'quiet' | 'maxWait' | 'maxBatch' | 'manual';
}

const DEFAULT_CONFIG: DebounceConfig = {
  quietMs: 300,
  maxWaitMs: 3000,
  maxBatchSize: 50,
};

let batchCounter = 0;

export class Debouncer {
  private config: DebounceConfig;
  private pending: Map<string, ChangeEvent> = new Map();
  private quietTimer: ReturnType<typeof setTimeout> | null = null;
  private maxWaitTimer: ReturnType<typeof setTimeout> | null = null;
  private windowStart = 0;
  private onFlush: (batch: ChangeBatch) => void;
  private destroyed = false;

  constructor(onFlush: (batch: ChangeBatch) => void, config?: Partial<DebounceConfig>) {
    this.onFlush = onFlush;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  push(e: ChangeEvent): boolean {
    if (this.destroyed) return false;

    if (this.pending.size === 0) {
      this.windowStart = e.ts;
      this.startMaxWaitTimer();
    }

    // Map keeps the first insertion position; the value becomes the latest event
    this.pending.set(e.path, e);
    this.restartQuietTimer();

    if (this.pending.size >= this.config.maxBatchSize) {
      this.flush('maxBatch');
    }

    return true;
  }

  flushNow(): void {
    this.flush('manual');
  }

  cancel(): void {
    this.clearTimers();
    this.pending.clear();
  }

  destroy(): void {
    this.cancel();
    this.destroyed = true;
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  private flush(reason: ChangeBatch['reason']): void {
    if (this.pending.size === 0) return;
    this.clearTimers();

    const batch: ChangeBatch = {
      changes: [...this.pending.values()],
      batchId: `batch-${++batchCounter}`,
      windowStart: this.windowStart,
      windowEnd: Date.now(),
      reason,
    };

    this.pending.clear();
    this.onFlush(batch);
  }

  private restartQuietTimer(): void {
    if (this.quietTimer) clearTimeout(this.quietTimer);
    this.quietTimer = setTimeout(() => this.flush('quiet'), this.config.quietMs);
  }

  private startMaxWaitTimer(): void {
    if (this.maxWaitTimer) return;
    this.maxWaitTimer = setTimeout(() => this.flush('maxWait'), this.config.maxWaitMs);
  }

  private clearTimers(): void {
    if (this.quietTimer) {
      clearTimeout(this.quietTimer);
      this.quietTimer = null;
    }
    if (this.maxWaitTimer) {
      clearTimeout(this.maxWaitTimer);
      this.maxWaitTimer = null;
    }
  }
}
