/**
 * Build seeder: submits one ad-hoc insight build per track for a revision
 * that has not been built yet, then reports the status of every build
 * recorded so far. Runs ahead of the candidate gate to surface failures
 * early; it never promotes anything.
 */

import { AddonVariables } from '../clients/addon';
import { PackageRegistry } from '../clients/charmhub';
import { TestService } from '../clients/sqa';
import { Bundle } from '../domain/bundle';
import { appNamePolicyForTrack, channelName, SUPPORTED_TEST_ARCH } from '../domain/channel';
import { toTypedError } from '../domain/errors';
import { Revision } from '../domain/revision-matrix';
import { Logger, logger as rootLogger } from '../logger';
import { SeedState, SeedStateStore } from '../storage/seed-state-store';

export interface BuildSeederOptions {
  registry: PackageRegistry;
  testService: TestService;
  store: SeedStateStore;
  bundleName: string;
  /** Bundle components; the first one keys the state file. */
  components: string[];
  risk?: string;
  arch?: string;
  base?: string;
  dryRun: boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface SeedCandidate {
  base: string;
  arch: string;
  revision: Revision;
}

export interface SeedReport {
  track: string;
  channel: string;
  submitted?: SeedCandidate & { jobId?: string };
  skipped?: string;
  /** Revision → `status: … result: … uuid: …` for every recorded build. */
  results: Record<string, string>;
}

export class BuildSeeder {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: BuildSeederOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'build-seeder' });
    this.now = options.now ?? (() => new Date());
  }

  async seed(track: string): Promise<SeedReport> {
    const channel = channelName(track, this.options.risk ?? 'beta');
    const log = this.log.child({ track, channel });
    const report: SeedReport = { track, channel, results: {} };

    const state = await this.options.store.load();
    log.info('Current state', { revisions: Object.keys(state) });

    const bundle = await this.fetchBundle(channel, log);
    if (typeof bundle === 'string') {
      report.skipped = bundle;
    } else {
      const candidate = this.pickCandidate(bundle, state);
      if (!candidate) {
        log.info('No untested revisions match the constraints. Skipping...');
        report.skipped = 'no untested revisions';
      } else {
        report.submitted = await this.submit(track, channel, bundle, candidate, state, log);
      }
    }

    report.results = await this.collectResults(log);
    return report;
  }

  /** Untested cells of the first component, in (base, arch) order. */
  candidates(bundle: Bundle, state: SeedState): SeedCandidate[] {
    const matrix = bundle.get(this.options.components[0]);
    if (!matrix) return [];

    const wantedArch = this.options.arch ?? SUPPORTED_TEST_ARCH;
    const found: SeedCandidate[] = [];
    for (const base of [...matrix.getBases()].sort()) {
      if (this.options.base && this.options.base !== base) continue;
      for (const arch of [...matrix.getArchs()].sort()) {
        if (wantedArch !== arch) continue;
        const revision = matrix.get(arch, base);
        if (revision === undefined || revision === '') continue;
        if (state[String(revision)]) continue;
        found.push({ base, arch, revision });
      }
    }
    return found;
  }

  private pickCandidate(bundle: Bundle, state: SeedState): SeedCandidate | undefined {
    const found = this.candidates(bundle, state);
    if (found.length > 0) {
      this.log.info('Found testable revisions', { count: found.length, cells: found });
    }
    return found[0];
  }

  /** The bundle on `channel`, or the reason the track is skipped. */
  private async fetchBundle(channel: string, log: Logger): Promise<Bundle | string> {
    const bundle = new Bundle(this.options.bundleName);
    for (const component of this.options.components) {
      try {
        const matrix = await this.options.registry.getRevisionMatrix(component, channel);
        if (!matrix.isPopulated()) {
          log.warn('Component has no revisions on channel', { charm: component });
          return `${component} has no revisions on ${channel}`;
        }
        log.info('Channel revisions', { charm: component, matrix: matrix.toString() });
        bundle.set(component, matrix);
      } catch (err) {
        const error = toTypedError(err);
        log.error('Failed to get revision matrix', { charm: component, error });
        return `failed to get revisions for ${component}: ${error.message}`;
      }
    }
    return bundle;
  }

  private async submit(
    track: string,
    channel: string,
    bundle: Bundle,
    candidate: SeedCandidate,
    state: SeedState,
    log: Logger,
  ): Promise<SeedCandidate & { jobId?: string }> {
    const { base, arch, revision } = candidate;
    const revisions = bundle.getRevisions(arch, base);
    const variables: AddonVariables = {
      base,
      arch,
      channel,
      branch: `release-${track}`,
      revisions,
      appNamePolicy: appNamePolicyForTrack(track),
    };
    const name = bundle.getVersion(arch, base) ?? `${this.options.bundleName}-${this.options.components[0]}-${revision}`;

    if (this.options.dryRun) {
      log.info('Would create build (dry run)', { base, arch, revisions });
      return candidate;
    }

    log.info('Creating build', { base, arch, revisions });
    const build = await this.options.testService.createBuild(name, variables);
    state[String(revision)] = {
      jobId: build.uuid,
      channel,
      arch,
      base,
      submittedAt: this.now().toISOString(),
    };
    await this.options.store.save(state);
    return { ...candidate, jobId: build.uuid };
  }

  /** Status lines for every recorded build. Lookups that fail are logged and left out. */
  async collectResults(log: Logger = this.log): Promise<Record<string, string>> {
    const state = await this.options.store.load();
    const results: Record<string, string> = {};

    for (const [revision, record] of Object.entries(state)) {
      try {
        const build = await this.options.testService.getBuild(record.jobId);
        if (!build) {
          log.warn('Build not found', { revision, jobId: record.jobId });
          continue;
        }
        results[revision] = `status: ${build.status} result: ${build.result ?? 'None'} uuid: ${build.uuid}`;
      } catch (err) {
        log.error('Failed to get build', { revision, jobId: record.jobId, error: toTypedError(err) });
      }
    }

    return results;
  }
}
