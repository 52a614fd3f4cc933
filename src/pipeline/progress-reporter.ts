import { CONFIG } from '../config';
import { eventBus } from './event-bus';
import type {
  BatchCompletedPayload,
  SimulationFinishedPayload,
  SimulationStartedPayload,
} from './event-bus';

/**
 * Prints throttled progress for one aggregate simulation task.
 */
export class ProgressReporter {
  private lastReport = 0;
  private readonly log: (line: string) => void;
  private readonly intervalMs: number;

  private onStartedBound: (payload: SimulationStartedPayload) => void;
  private onBatchBound: (payload: BatchCompletedPayload) => void;
  private onFinishedBound: (payload: SimulationFinishedPayload) => void;

  constructor(
    private readonly task: string,
    options: { log?: (line: string) => void; intervalMs?: number } = {},
  ) {
    this.log = options.log ?? (line => console.log(line));
    this.intervalMs = options.intervalMs ?? CONFIG.PROGRESS_INTERVAL_MS;

    this.onStartedBound = this.onStarted.bind(this);
    this.onBatchBound = this.onBatch.bind(this);
    this.onFinishedBound = this.onFinished.bind(this);
  }

  start(): void {
    eventBus.on('simulation-started', this.onStartedBound);
    eventBus.on('batch-completed', this.onBatchBound);
    eventBus.on('simulation-finished', this.onFinishedBound);
  }

  stop(): void {
    eventBus.off('simulation-started', this.onStartedBound);
    eventBus.off('batch-completed', this.onBatchBound);
    eventBus.off('simulation-finished', this.onFinishedBound);
  }

  private onStarted(payload: SimulationStartedPayload): void {
    if (payload.task !== this.task) return;
    this.lastReport = Date.now();
    this.log(`Starting ${this.task}`);
  }

  private onBatch(payload: BatchCompletedPayload): void {
    if (payload.task !== this.task) return;
    const now = Date.now();
    if (now - this.lastReport < this.intervalMs) return;
    this.lastReport = now;
    this.log(`  Completed: ${payload.completedRuns} simulation runs`);
  }

  private onFinished(payload: SimulationFinishedPayload): void {
    if (payload.task !== this.task) return;
    this.log(`Done ${this.task}, took ${(payload.elapsedMs / 1000).toFixed(3)} seconds`);
  }
}
