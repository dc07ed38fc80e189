import { BatchTotals, ExplainMode, UnitResult } from '../types/results.js';

export type UnitState = 'PENDING' | 'RUNNING' | 'SUCCESS' | 'ERROR';

const TRANSITIONS: Record<UnitState, readonly UnitState[]> = {
  PENDING: ['RUNNING'],
  RUNNING: ['SUCCESS', 'ERROR'],
  SUCCESS: [],
  ERROR: [],
};

export class IllegalTransitionError extends Error {
  constructor(unit: string, from: UnitState, to: UnitState) {
    super(`Unit "${unit}" cannot move from ${from} to ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * One logical unit (index, query, explain) moving through PENDING → RUNNING → SUCCESS | ERROR.
 * Explain capture may re-enter RUNNING under a lower verbosity via `fallback`.
 */
export class UnitRun {
  private state: UnitState = 'PENDING';
  private startedAt = 0;
  private mode?: ExplainMode;

  constructor(
    readonly name: string,
    private readonly clock: () => number = () => performance.now()
  ) {}

  get status(): UnitState {
    return this.state;
  }

  get currentMode(): ExplainMode | undefined {
    return this.mode;
  }

  start(mode?: ExplainMode): this {
    this.move('RUNNING');
    this.mode = mode;
    this.startedAt = this.clock();
    return this;
  }

  /** RUNNING(high verbosity) → RUNNING(reduced verbosity), only after a timeout. */
  fallback(mode: ExplainMode): this {
    if (this.state !== 'RUNNING') throw new IllegalTransitionError(this.name, this.state, 'RUNNING');
    this.mode = mode;
    return this;
  }

  succeed(seconds?: number): UnitResult {
    this.move('SUCCESS');
    return this.result('SUCCESS', seconds);
  }

  fail(message: string): UnitResult {
    this.move('ERROR');
    return { ...this.result('ERROR'), message };
  }

  elapsedSeconds(): number {
    return Math.max(0, (this.clock() - this.startedAt) / 1000);
  }

  private result(status: UnitResult['status'], seconds?: number): UnitResult {
    const time = seconds ?? this.elapsedSeconds();
    return {
      name: this.name,
      status,
      time,
      ...(this.mode ? { mode: this.mode } : {}),
    };
  }

  private move(to: UnitState) {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new IllegalTransitionError(this.name, this.state, to);
    }
    this.state = to;
  }
}

export class UnitBatch {
  private readonly results: UnitResult[] = [];

  add(result: UnitResult): UnitResult {
    this.results.push(result);
    return result;
  }

  all(): readonly UnitResult[] {
    return this.results;
  }

  totals(): BatchTotals {
    const attempted = this.results.length;
    const succeeded = this.results.filter(r => r.status === 'SUCCESS').length;
    const totalTime = this.results.reduce((sum, r) => sum + r.time, 0);
    return {
      attempted,
      succeeded,
      failed: attempted - succeeded,
      totalTime,
      averageTime: attempted > 0 ? totalTime / attempted : 0,
    };
  }
}
