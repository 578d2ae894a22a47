/**
 * Training run tracker
 * ====================
 * In-memory view of recent training runs so a UI can show progress.
 */

import { v4 as uuidv4 } from 'uuid';
import type { SensoryTarget } from '../contracts/batch_record.contract.js';
import type { Algorithm, TrainingPhase } from '../contracts/sensory_model.contract.js';
import { systemClock, type Clock } from '../contracts/host.deps.js';

export type TrainingRunStatus = 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface TrainingRun {
  runId: string;
  target: SensoryTarget;
  algorithm: Algorithm;
  status: TrainingRunStatus;
  phase: TrainingPhase;
  startedAt: string;
  completedAt: string | null;
  modelId: string | null;
  error: { code: string; message: string } | null;
}

const MAX_RUNS = 50;

export class TrainingRunTracker {
  private readonly runs = new Map<string, TrainingRun>();

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly maxRuns = MAX_RUNS
  ) {}

  start(target: SensoryTarget, algorithm: Algorithm): TrainingRun {
    const run: TrainingRun = {
      runId: uuidv4(),
      target,
      algorithm,
      status: 'RUNNING',
      phase: 'LOADING',
      startedAt: this.clock.now().toISOString(),
      completedAt: null,
      modelId: null,
      error: null,
    };
    this.runs.set(run.runId, run);
    this.evict();
    return { ...run };
  }

  phase(runId: string, phase: TrainingPhase): void {
    const run = this.runs.get(runId);
    if (run && run.status === 'RUNNING') {
      run.phase = phase;
    }
  }

  complete(runId: string, modelId: string): void {
    const run = this.runs.get(runId);
    if (!run) return;
    run.status = 'COMPLETED';
    run.modelId = modelId;
    run.completedAt = this.clock.now().toISOString();
  }

  fail(runId: string, error: { code: string; message: string }): void {
    const run = this.runs.get(runId);
    if (!run) return;
    run.status = 'FAILED';
    run.error = error;
    run.completedAt = this.clock.now().toISOString();
  }

  get(runId: string): TrainingRun | null {
    const run = this.runs.get(runId);
    return run ? { ...run } : null;
  }

  /** Newest first */
  list(): TrainingRun[] {
    return [...this.runs.values()].reverse().map((run) => ({ ...run }));
  }

  isRunning(): boolean {
    for (const run of this.runs.values()) {
      if (run.status === 'RUNNING') return true;
    }
    return false;
  }

  private evict(): void {
    while (this.runs.size > this.maxRuns) {
      const oldest = this.runs.keys().next();
      if (oldest.done) return;
      this.runs.delete(oldest.value);
    }
  }
}
