/**
 * Risk-Ladder Promoter: time-based promotion of snap revisions.
 *
 * Every revision moves one risk level at a time once it has stayed at its
 * current level for the configured number of days. A new patch version on
 * edge moves to beta straight away. The first stable release of a track is
 * never promoted automatically: it only produces an approval request.
 */

import { SnapStore, ChannelMapEntry } from '../clients/snapstore';
import {
  channelName,
  DAYS_TO_STAY_IN_RISK,
  IGNORE_TRACKS,
  isRisk,
  nextRisk,
  Risk,
  RISK_LEVELS,
} from '../domain/channel';
import { toTypedError, TypedError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

/** Series the upgrade test images are prepared for. */
export const SERIES: readonly string[] = ['20.04', '22.04', '24.04'];

const DAY_MS = 24 * 60 * 60 * 1000;

const RUNNER_ARCH: Record<string, string> = { amd64: 'X64', arm64: 'ARM64' };

/** Self-hosted runner labels for an upgrade test on `arch`. */
export function runnerLabels(arch: string): string[] {
  return ['self-hosted', 'Linux', RUNNER_ARCH[arch] ?? arch];
}

export interface PromotionProposal {
  name: string;
  track: string;
  arch: string;
  revision: number;
  fromChannel: string;
  toChannel: string;
  /** Branch the upgrade test checks out. */
  branch: string;
  /** Pairs of [target, source] channels the upgrade test walks through. */
  upgradeChannels: [string, string][];
  lxdImages: string[];
  runnerLabels: string[];
}

/** A proposal whose release was attempted and refused. */
export interface FailedRelease {
  proposal: PromotionProposal;
  error: TypedError;
}

/** A promotion that is due but needs a manual sign-off. */
export interface ApprovalRequest {
  track: string;
  arch: string;
  revision: number;
  toChannel: string;
}

export interface RiskLadderPlan {
  proposals: PromotionProposal[];
  approvals: ApprovalRequest[];
  /** Filled by run(); evaluate() leaves it empty. */
  failed: FailedRelease[];
}

export interface RiskLadderPromoterOptions {
  snapStore: SnapStore;
  snapName: string;
  dryRun: boolean;
  now?: () => Date;
  series?: readonly string[];
  logger?: Logger;
}

function entryKey(track: string, risk: string, arch: string): string {
  return `${track}/${risk}/${arch}`;
}

/** Whole days between `from` and `to`, rounded down. */
export function elapsedDays(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

export class RiskLadderPromoter {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly series: readonly string[];

  constructor(private readonly options: RiskLadderPromoterOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'risk-ladder', snap: options.snapName });
    this.now = options.now ?? (() => new Date());
    this.series = options.series ?? SERIES;
  }

  /** Work out which revisions are due for promotion. Pure over its inputs. */
  evaluate(entries: ChannelMapEntry[], now: Date = this.now()): RiskLadderPlan {
    const byKey = new Map<string, ChannelMapEntry>();
    const tracksWithStable = new Set<string>();
    for (const entry of entries) {
      byKey.set(entryKey(entry.track, entry.risk, entry.architecture), entry);
      if (entry.risk === 'stable') tracksWithStable.add(entry.track);
    }

    const ordered = entries
      .filter((entry): entry is ChannelMapEntry & { risk: Risk } => isRisk(entry.risk))
      .sort((a, b) => a.track.localeCompare(b.track) || RISK_LEVELS.indexOf(a.risk) - RISK_LEVELS.indexOf(b.risk))
      .reverse();

    const plan: RiskLadderPlan = { proposals: [], approvals: [], failed: [] };

    for (const entry of ordered) {
      const { track, risk, architecture: arch, revision } = entry;
      const log = this.log.child({ channel: channelName(track, risk), arch });
      const target = nextRisk(risk);

      if (target === null || risk === 'stable') {
        log.debug('Skipping promoting stable');
        continue;
      }
      if (IGNORE_TRACKS.includes(track)) {
        log.debug('Skipping ignored track');
        continue;
      }

      const next = byKey.get(entryKey(track, target, arch));
      log.debug('Evaluating revision', { revision, releasedAt: entry.releasedAt?.toISOString() });

      const dwellComplete =
        entry.releasedAt !== undefined &&
        elapsedDays(entry.releasedAt, now) >= DAYS_TO_STAY_IN_RISK[risk] &&
        revision !== next?.revision;
      const newPatchInEdge = risk === 'edge' && next?.version !== entry.version;

      if (!dwellComplete && !newPatchInEdge) continue;

      const fromChannel = channelName(track, risk);
      const toChannel = channelName(track, target);

      if (target === 'stable' && !tracksWithStable.has(track)) {
        log.warn('First stable release needs approval', { revision, to: toChannel });
        plan.approvals.push({ track, arch, revision, toChannel });
        continue;
      }

      log.info('Proposing promotion', { revision, to: toChannel });
      plan.proposals.push({
        name: `${this.options.snapName}-${track}-${target}-${arch}`,
        track,
        arch,
        revision,
        fromChannel,
        toChannel,
        branch: `release-${track}`,
        upgradeChannels: [[toChannel, fromChannel]],
        lxdImages: this.series.map((series) => `ubuntu:${series}`),
        runnerLabels: runnerLabels(arch),
      });
    }

    return plan;
  }

  /** Fetch the channel map and work out the plan. */
  async propose(): Promise<RiskLadderPlan> {
    const entries = await this.options.snapStore.channelMap(this.options.snapName);
    return this.evaluate(entries);
  }

  /** Release a single revision into a channel. */
  async release(revision: number, channel: string): Promise<void> {
    if (this.options.dryRun) {
      this.log.info('Would release revision (dry run)', { revision, channel });
      return;
    }
    await this.options.snapStore.releaseRevision(this.options.snapName, revision, channel);
  }

  /**
   * Propose, then release every proposal one revision at a time. A refused
   * release is recorded on the plan and the remaining proposals still run.
   */
  async run(): Promise<RiskLadderPlan> {
    const plan = await this.propose();
    for (const proposal of plan.proposals) {
      try {
        await this.release(proposal.revision, proposal.toChannel);
      } catch (err) {
        const error = toTypedError(err, proposal.track);
        this.log.error('Release failed', { proposal: proposal.name, revision: proposal.revision, error });
        plan.failed.push({ proposal, error });
      }
    }
    return plan;
  }
}
