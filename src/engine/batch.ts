/**
 * Batch runner: one reconciliation pass over a list of tracks.
 *
 * Tracks are processed one after another with a shared priority counter.
 * A track that fails never stops the pass.
 */

import { writeFile } from 'fs/promises';
import { v4 as uuid } from 'uuid';
import { toTypedError } from '../domain/errors';
import { ProcessOutcome, TrackPhase, TrackReport, TRIVIAL_OUTCOMES } from '../domain/track-state';
import { Logger, logger as rootLogger } from '../logger';
import { PriorityCounter } from './priority-counter';

/** Anything that can reconcile one track against a pass-wide priority counter. */
export interface TrackProcessor {
  reconcile(track: string, priorities: PriorityCounter): Promise<TrackReport>;
}

export interface PassReport {
  passId: string;
  startedAt: string;
  completedAt: string;
  reports: TrackReport[];
}

export async function runReconcilePass(
  tracks: string[],
  processor: TrackProcessor,
  log: Logger = rootLogger,
): Promise<PassReport> {
  const passId = `pass_${uuid()}`;
  const passLog = log.child({ passId });
  const priorities = new PriorityCounter();
  const startedAt = new Date().toISOString();
  const reports: TrackReport[] = [];

  passLog.info('Starting reconciliation pass', { tracks });

  for (const track of tracks) {
    try {
      reports.push(await processor.reconcile(track, priorities));
    } catch (err) {
      const error = toTypedError(err, track);
      passLog.error('Track processor threw', { track, error });
      const now = new Date().toISOString();
      reports.push({
        track,
        outcome: ProcessOutcome.CiFailed,
        phases: [TrackPhase.Fetching, TrackPhase.CiFailed],
        cells: [],
        promoted: [],
        error,
        startedAt: now,
        completedAt: now,
        durationMs: 0,
      });
    }
  }

  const completedAt = new Date().toISOString();
  passLog.info('Reconciliation pass complete', {
    outcomes: Object.fromEntries(reports.map((report) => [report.track, report.outcome])),
  });

  return { passId, startedAt, completedAt, reports };
}

/** `track → outcome` for every report worth surfacing. */
export function nonTrivialResults(reports: TrackReport[]): Record<string, string> {
  const results: Record<string, string> = {};
  for (const report of reports) {
    if (TRIVIAL_OUTCOMES.includes(report.outcome)) continue;
    results[report.track] = report.outcome;
  }
  return results;
}

/** `key=value` lines, one per entry, each newline-terminated. */
export function formatResults(results: Record<string, string>): string {
  return Object.entries(results)
    .map(([key, value]) => `${key}=${value}\n`)
    .join('');
}

export async function writeResultsFile(path: string, results: Record<string, string>): Promise<void> {
  await writeFile(path, formatResults(results), 'utf-8');
}
