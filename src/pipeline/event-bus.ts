import { EventEmitter } from 'events';

// === Typed Event Payloads ===

export interface SimulationStartedPayload {
  task: string;
  totalRuns: number;
  batches: number;
}

export interface BatchCompletedPayload {
  task: string;
  /** Runs folded into the tally so far, in completion order. */
  completedRuns: number;
  totalRuns: number;
  /** Simulations spent so far, including discarded ones in conditioned mode. */
  attempts: number;
}

export interface SimulationFinishedPayload {
  task: string;
  completedRuns: number;
  elapsedMs: number;
}

// === Event Map ===

export interface SimulationEventMap {
  'simulation-started': SimulationStartedPayload;
  'batch-completed': BatchCompletedPayload;
  'simulation-finished': SimulationFinishedPayload;
}

// === Typed Event Bus ===

class TypedEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends keyof SimulationEventMap>(
    event: K,
    listener: (payload: SimulationEventMap[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof SimulationEventMap>(
    event: K,
    listener: (payload: SimulationEventMap[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  emit<K extends keyof SimulationEventMap>(
    event: K,
    payload: SimulationEventMap[K],
  ): void {
    this.emitter.emit(event, payload);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

// Singleton export
export const eventBus = new TypedEventBus();
