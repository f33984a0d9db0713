/**
 * Track state domain model.
 *
 * A TrackState maps each tested (arch, base) cell of a track to its
 * effective test status and reduces the map to a single verdict.
 */

import { TestPlanInstanceStatus, statusTraits } from './test-status';
import { TypedError } from './errors';

/** Outcome of one reconciliation pass over a track, as written to the results file. */
export enum ProcessOutcome {
  Success = 'process_success',
  InProgress = 'process_in_progress',
  Failed = 'process_failed',
  CiFailed = 'process_ci_failed',
  Unchanged = 'process_unchanged',
}

/** Outcomes left out of the results file. */
export const TRIVIAL_OUTCOMES: readonly ProcessOutcome[] = [ProcessOutcome.InProgress, ProcessOutcome.Unchanged];

/** Phases a track passes through during one reconciliation pass. */
export enum TrackPhase {
  Fetching = 'fetching',
  NoCandidateData = 'no_candidate_data',
  AlreadyPromoted = 'already_promoted',
  NotTestable = 'not_testable',
  Evaluating = 'evaluating',
  Success = 'success',
  InProgress = 'in_progress',
  Failed = 'failed',
  CiFailed = 'ci_failed',
  Unchanged = 'unchanged',
}

/** Valid phase transitions. Terminal phases have none. */
export const VALID_TRACK_TRANSITIONS: Record<TrackPhase, TrackPhase[]> = {
  [TrackPhase.Fetching]: [
    TrackPhase.NoCandidateData,
    TrackPhase.AlreadyPromoted,
    TrackPhase.NotTestable,
    TrackPhase.Evaluating,
    TrackPhase.CiFailed,
  ],
  [TrackPhase.NoCandidateData]: [TrackPhase.Unchanged],
  [TrackPhase.AlreadyPromoted]: [TrackPhase.Unchanged],
  [TrackPhase.NotTestable]: [TrackPhase.Unchanged],
  [TrackPhase.Evaluating]: [TrackPhase.Success, TrackPhase.InProgress, TrackPhase.Failed, TrackPhase.CiFailed],
  [TrackPhase.Success]: [],
  [TrackPhase.InProgress]: [],
  [TrackPhase.Failed]: [],
  [TrackPhase.CiFailed]: [],
  [TrackPhase.Unchanged]: [],
};

/** Terminal phase → process outcome. */
export const PHASE_OUTCOME: Partial<Record<TrackPhase, ProcessOutcome>> = {
  [TrackPhase.Success]: ProcessOutcome.Success,
  [TrackPhase.InProgress]: ProcessOutcome.InProgress,
  [TrackPhase.Failed]: ProcessOutcome.Failed,
  [TrackPhase.CiFailed]: ProcessOutcome.CiFailed,
  [TrackPhase.Unchanged]: ProcessOutcome.Unchanged,
};

export class TrackState {
  private readonly states = new Map<string, TestPlanInstanceStatus>();

  set(cell: string, status: TestPlanInstanceStatus): void {
    this.states.set(cell, status);
  }

  get(cell: string): TestPlanInstanceStatus | undefined {
    return this.states.get(cell);
  }

  get size(): number {
    return this.states.size;
  }

  get failed(): boolean {
    return [...this.states.values()].some((status) => statusTraits(status).failed);
  }

  /** All cells passed. An empty state has not succeeded. */
  get succeeded(): boolean {
    if (this.states.size === 0) return false;
    return [...this.states.values()].every((status) => statusTraits(status).succeeded);
  }

  get inProgress(): boolean {
    if (this.failed) return false;
    return [...this.states.values()].some((status) => statusTraits(status).inProgress);
  }

  entries(): Array<[string, TestPlanInstanceStatus]> {
    return [...this.states.entries()];
  }

  toJSON(): Record<string, TestPlanInstanceStatus> {
    return Object.fromEntries(this.states);
  }
}

/** Verdict a track state reduces to. `unknown` covers the empty state. */
export type TrackVerdict = 'failed' | 'in_progress' | 'succeeded' | 'unknown';

/** Reduce a track state with failed > in progress > succeeded precedence. */
export function reduceTrackState(state: TrackState): TrackVerdict {
  if (state.failed) return 'failed';
  if (state.inProgress) return 'in_progress';
  if (state.succeeded) return 'succeeded';
  return 'unknown';
}

/** Status of a single tested cell, reported for audit. */
export interface CellReport {
  cell: string;
  arch: string;
  base: string;
  version: string;
  revisions: Record<string, string | number>;
  status: TestPlanInstanceStatus;
  /** Whether a test was submitted for this cell during the pass. */
  started: boolean;
}

/** Result of reconciling one track. */
export interface TrackReport {
  track: string;
  outcome: ProcessOutcome;
  phases: TrackPhase[];
  cells: CellReport[];
  promoted: string[];
  error?: TypedError;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}
