export type ApplyOperation = 'createDatabase' | 'enableSharding' | 'createCollection' | 'shardCollection' | 'createIndex';

export type ApplyStatus = 'created' | 'skipped' | 'failed';

export interface ApplyTarget {
  database: string;
  collection?: string;
  index?: string;
  operation: ApplyOperation;
}

export interface ApplyResult {
  target: ApplyTarget;
  status: ApplyStatus;
  message: string;
}

export interface ApplySummary {
  databases: number;
  collections: number;
  indexes: number;
  skipped: ApplyResult[];
  errors: ApplyResult[];
}

export type UnitStatus = 'SUCCESS' | 'ERROR';

export type ExplainMode = 'allPlansExecution' | 'executionStats';

export interface UnitResult {
  name: string;
  status: UnitStatus;
  /** Elapsed seconds. */
  time: number;
  mode?: ExplainMode;
  message?: string;
}

export interface BatchTotals {
  attempted: number;
  succeeded: number;
  failed: number;
  totalTime: number;
  averageTime: number;
}
