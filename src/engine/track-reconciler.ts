/**
 * Track Reconciler: candidate → stable promotion gated on QA results.
 *
 * For each track the reconciler compares what is published on
 * `<track>/candidate` with `<track>/stable` for every bundle component,
 * tests the candidate bundle cell by cell, and promotes once every tested
 * cell has passed:
 *
 *   fetching ─┬─ no_candidate_data ─┐
 *             ├─ already_promoted ──┼─ unchanged
 *             ├─ not_testable ──────┘
 *             ├─ evaluating ─┬─ success | in_progress | failed | ci_failed
 *             └─ ci_failed
 *
 * Each cell is in one of these states:
 *   - no test plan instance yet  → start one (the cell counts as in progress)
 *   - any instance passed        → passed
 *   - any instance in progress   → in progress
 *   - only failed/errored ones   → failed, a human has to look at it
 *
 * The reconciler is safe to re-run: test submissions are keyed by the
 * bundle's composite version, and state is re-read from the services on
 * every pass.
 */

import { AddonVariables } from '../clients/addon';
import { PackageRegistry } from '../clients/charmhub';
import { TestService } from '../clients/sqa';
import { Bundle } from '../domain/bundle';
import { appNamePolicyForTrack, channelName, SUPPORTED_TEST_ARCH } from '../domain/channel';
import { InvariantError, PromotionError, toTypedError, TypedError } from '../domain/errors';
import { RevisionMatrix } from '../domain/revision-matrix';
import { TestPlanInstanceStatus } from '../domain/test-status';
import {
  CellReport,
  PHASE_OUTCOME,
  ProcessOutcome,
  reduceTrackState,
  TrackPhase,
  TrackReport,
  TrackState,
} from '../domain/track-state';
import { Logger, logger as rootLogger } from '../logger';
import { PriorityCounter } from './priority-counter';
import { isTerminalTrackPhase, transitionTrackPhase } from './state-machine';
import { TestStatusResolver } from './status-resolver';

export interface TrackReconcilerOptions {
  registry: PackageRegistry;
  testService: TestService;
  bundleName: string;
  components: string[];
  /** Log decisions without starting tests or promoting. */
  dryRun: boolean;
  /** Architecture the test service can test. Other architectures are skipped. */
  testArch?: string;
  logger?: Logger;
}

/** Matrices fetched for one component. */
interface ComponentMatrices {
  component: string;
  candidate: RevisionMatrix;
  stable: RevisionMatrix;
}

/** Phase bookkeeping for one track. */
class PhaseTracker {
  readonly phases: TrackPhase[] = [TrackPhase.Fetching];

  get current(): TrackPhase {
    return this.phases[this.phases.length - 1];
  }

  advance(target: TrackPhase): void {
    const result = transitionTrackPhase(this.current, target);
    if (!result.success) {
      throw new InvariantError(result.error ?? toTypedError(new Error(`Invalid transition to ${target}`)));
    }
    this.phases.push(target);
  }

  /** Record a CI failure from whatever phase the track reached. */
  fail(log: Logger): void {
    if (isTerminalTrackPhase(this.current)) return;
    const result = transitionTrackPhase(this.current, TrackPhase.CiFailed);
    if (!result.success) {
      log.error('Track failed outside a fallible phase', { phase: this.current });
    }
    this.phases.push(TrackPhase.CiFailed);
  }
}

export class TrackReconciler {
  private readonly resolver: TestStatusResolver;
  private readonly log: Logger;
  private readonly testArch: string;

  constructor(private readonly options: TrackReconcilerOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'track-reconciler' });
    this.resolver = new TestStatusResolver(options.testService, this.log);
    this.testArch = options.testArch ?? SUPPORTED_TEST_ARCH;
  }

  /**
   * Reconcile one track. Never throws: every failure is folded into the
   * returned report as a ci_failed outcome.
   */
  async reconcile(track: string, priorities: PriorityCounter): Promise<TrackReport> {
    const startedAt = new Date();
    const log = this.log.child({ track });
    const tracker = new PhaseTracker();
    const cells: CellReport[] = [];
    const promoted: string[] = [];
    let error: TypedError | undefined;

    try {
      await this.run(track, priorities, tracker, cells, promoted, log);
    } catch (err) {
      error = toTypedError(err, track);
      if (err instanceof PromotionError) {
        log.error('Promotion failed after tests passed', { error });
      } else {
        log.error('Processing track failed', { error });
      }
      tracker.fail(log);
    }

    const completedAt = new Date();
    const outcome = PHASE_OUTCOME[tracker.current] ?? ProcessOutcome.CiFailed;
    log.info('Track processed', { outcome, phases: tracker.phases });

    return {
      track,
      outcome,
      phases: tracker.phases,
      cells,
      promoted,
      error,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };
  }

  private async run(
    track: string,
    priorities: PriorityCounter,
    tracker: PhaseTracker,
    cells: CellReport[],
    promoted: string[],
    log: Logger,
  ): Promise<void> {
    const candidateChannel = channelName(track, 'candidate');
    const stableChannel = channelName(track, 'stable');

    const fetched = await this.fetchMatrices(candidateChannel, stableChannel, log);

    const bundle = new Bundle(this.options.bundleName);
    const deltas: string[] = [];
    for (const { component, candidate, stable } of fetched) {
      if (!candidate.isPopulated()) {
        log.info('Candidate channel has no revisions, using stable', { charm: component, channel: candidateChannel });
        bundle.set(component, stable);
      } else if (candidate.equals(stable)) {
        log.info('Candidate channel already published to stable', { charm: component, channel: candidateChannel });
        bundle.set(component, stable);
      } else {
        bundle.set(component, candidate);
        deltas.push(component);
      }
    }

    if (deltas.length === 0) {
      const allEmpty = fetched.every(({ candidate }) => !candidate.isPopulated());
      tracker.advance(allEmpty ? TrackPhase.NoCandidateData : TrackPhase.AlreadyPromoted);
      log.info('Nothing new to promote. Skipping...', { channel: candidateChannel });
      tracker.advance(TrackPhase.Unchanged);
      return;
    }

    const untestable = bundle.explainUntestable();
    if (untestable) {
      tracker.advance(TrackPhase.NotTestable);
      log.warn('Bundle is not testable. Skipping...', { bundle: bundle.name, reason: untestable });
      tracker.advance(TrackPhase.Unchanged);
      return;
    }

    tracker.advance(TrackPhase.Evaluating);
    const state = await this.ensureTrackState(track, candidateChannel, bundle, priorities, cells, log);
    log.info('Track state', { state: state.toJSON() });

    switch (reduceTrackState(state)) {
      case 'succeeded':
        log.info('Release run succeeded. Promoting charm revisions...', { components: deltas });
        for (const component of deltas) {
          if (!this.options.dryRun) {
            await this.options.registry.promote(component, candidateChannel, stableChannel);
          }
          promoted.push(component);
        }
        tracker.advance(TrackPhase.Success);
        return;
      case 'failed':
        log.warn('Release run failed. Manual intervention required.');
        tracker.advance(TrackPhase.Failed);
        return;
      case 'in_progress':
        log.info('Release run is still in progress. No action needed.');
        tracker.advance(TrackPhase.InProgress);
        return;
      case 'unknown':
        log.error('Unknown track state: no cell was tested', { testArch: this.testArch });
        tracker.advance(TrackPhase.CiFailed);
        return;
    }
  }

  /** Fetch candidate and stable matrices for every component; any failure aborts the track. */
  private async fetchMatrices(candidateChannel: string, stableChannel: string, log: Logger): Promise<ComponentMatrices[]> {
    const fetched: ComponentMatrices[] = [];
    for (const component of this.options.components) {
      const candidate = await this.options.registry.getRevisionMatrix(component, candidateChannel);
      log.info('Channel revisions', { charm: component, channel: candidateChannel, matrix: candidate.toString() });

      const stable = await this.options.registry.getRevisionMatrix(component, stableChannel);
      log.info('Channel revisions', { charm: component, channel: stableChannel, matrix: stable.toString() });

      fetched.push({ component, candidate, stable });
    }
    return fetched;
  }

  private async ensureTrackState(
    track: string,
    channel: string,
    bundle: Bundle,
    priorities: PriorityCounter,
    cells: CellReport[],
    log: Logger,
  ): Promise<TrackState> {
    const state = new TrackState();

    for (const arch of [...bundle.getArchs()].sort()) {
      // The test service cannot tell environments apart per architecture yet;
      // testing a second one would bind duplicate jobs to the same version.
      if (arch !== this.testArch) {
        log.info('Skipping architecture not supported by the test service', { arch });
        continue;
      }

      for (const base of [...bundle.getBases()].sort()) {
        const version = bundle.getVersion(arch, base);
        if (!version) continue;

        const cell = `${arch}/${base}`;
        const revisions = bundle.getRevisions(arch, base);
        let status = await this.resolver.resolve(channel, version);
        let started = false;

        if (status === null) {
          const variables: AddonVariables = {
            base,
            arch,
            channel,
            branch: `release-${track}`,
            revisions,
            appNamePolicy: appNamePolicyForTrack(track),
          };
          if (this.options.dryRun) {
            log.info('Would start release test (dry run)', { cell, version });
          } else {
            const priority = priorities.next();
            log.info('Starting release test', { cell, version, priority });
            await this.options.testService.startTest({ channel, base, arch, version, priority, variables });
          }
          status = TestPlanInstanceStatus.InProgress;
          started = true;
        }

        state.set(cell, status);
        cells.push({ cell, arch, base, version, revisions, status, started });
      }
    }

    return state;
  }
}
