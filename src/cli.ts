#!/usr/bin/env node
/**
 * release-reconciler CLI
 *
 * Usage:
 *   release-reconciler charm-release [--supported-tracks <tracks...> | --after <version>] [--dry-run]
 *   release-reconciler promote-tracks [--output <file>] [--dry-run]
 *   release-reconciler release-revision --revision <n> --channel <channel> [--dry-run]
 *   release-reconciler seed-builds [--risk <risk>] [--arch <arch>] [--base <base>] [--state-file <file>]
 *
 * Per-track outcomes go to the results file; the exit code only reflects
 * configuration or usage errors.
 */

import { writeFile } from 'fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import { CharmhubRegistry, PackageRegistry } from './clients/charmhub';
import { ExecaCommandRunner } from './clients/command';
import { HttpClient } from './clients/http';
import { SnapStore, SnapStoreClient } from './clients/snapstore';
import { SqaTestService, TestService, toTestServiceError } from './clients/sqa';
import { GithubReleases, TAGS_RETRY, TAGS_TIMEOUT_MS, UpstreamReleases } from './clients/upstream-releases';
import { loadConfig, ReleaseConfig } from './config';
import { PromotionError, toTypedError } from './domain/errors';
import { runReconcilePass, nonTrivialResults, writeResultsFile } from './engine/batch';
import { BuildSeeder } from './engine/build-seeder';
import { RiskLadderPromoter } from './engine/risk-ladder';
import { TrackReconciler } from './engine/track-reconciler';
import { LogLevel, logger, parseLogLevel, setLogLevel } from './logger';
import { SeedStateStore } from './storage/seed-state-store';

export const DEFAULT_AFTER = '1.32';

export interface Services {
  registry: PackageRegistry;
  testService: TestService;
  snapStore: SnapStore;
  upstream: UpstreamReleases;
}

export type ServiceFactory = (config: ReleaseConfig) => Services;

/** Wire the production clients from configuration. */
export function createServices(config: ReleaseConfig): Services {
  const registryHttp = new HttpClient({ domain: 'REGISTRY', timeoutMs: config.httpTimeoutMs });
  const upstreamHttp = new HttpClient({ domain: 'UPSTREAM', timeoutMs: TAGS_TIMEOUT_MS, retry: TAGS_RETRY });
  const releaseCommands = new ExecaCommandRunner({
    timeoutMs: config.commandTimeoutMs,
    toError: (failure) => new PromotionError(failure),
  });
  const sqaCommands = new ExecaCommandRunner({ timeoutMs: config.commandTimeoutMs, toError: toTestServiceError });

  return {
    registry: new CharmhubRegistry({
      http: registryHttp,
      commands: releaseCommands,
      baseUrl: config.charmhubUrl,
      charmcraftBin: config.charmcraftBin,
    }),
    testService: new SqaTestService({
      commands: sqaCommands,
      bin: config.sqaBin,
      productUuid: config.sqaProductUuid,
      testPlanId: config.sqaTestPlanId,
      testPlanName: config.sqaTestPlanName,
    }),
    snapStore: new SnapStoreClient({
      http: registryHttp,
      commands: releaseCommands,
      baseUrl: config.snapstoreUrl,
      snapcraftBin: config.snapcraftBin,
    }),
    upstream: new GithubReleases({ http: upstreamHttp, apiUrl: config.githubApiUrl, token: config.githubToken }),
  };
}

interface TrackSelection {
  supportedTracks?: string[];
  after: string;
}

interface CharmReleaseOptions extends TrackSelection {
  dryRun: boolean;
  resultsFile: string;
}

interface PromoteTracksOptions {
  dryRun: boolean;
  output?: string;
}

interface ReleaseRevisionOptions {
  revision: number;
  channel: string;
  dryRun: boolean;
}

interface SeedBuildsOptions extends TrackSelection {
  risk: string;
  arch: string;
  base?: string;
  stateFile: string;
  dryRun: boolean;
  resultsFile: string;
}

/** Explicit tracks win; otherwise every upstream track at or after `after`. */
export async function resolveTracks(selection: TrackSelection, upstream: UpstreamReleases): Promise<string[]> {
  if (selection.supportedTracks && selection.supportedTracks.length > 0) {
    return selection.supportedTracks;
  }
  logger.info('Getting all Kubernetes releases after threshold, inclusive', { after: selection.after });
  return upstream.listTracksAfter(selection.after);
}

function parseLogLevelOption(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) throw new InvalidArgumentError(`Expected one of ${Object.values(LogLevel).join(', ')}.`);
  return level;
}

function parseRevision(value: string): number {
  const revision = Number(value);
  if (!Number.isInteger(revision) || revision <= 0) throw new InvalidArgumentError('Expected a positive integer.');
  return revision;
}

function trackSelectionOptions(command: Command): Command {
  return command
    .addOption(new Option('--supported-tracks <tracks...>', 'tracks to process').conflicts('after'))
    .addOption(new Option('--after <version>', 'least supported track, inclusive').default(DEFAULT_AFTER));
}

export function buildProgram(factory: ServiceFactory = createServices, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();
  let config: ReleaseConfig | undefined;
  let services: Services | undefined;

  const load = (): { config: ReleaseConfig; services: Services } => {
    config ??= loadConfig(env);
    services ??= factory(config);
    return { config, services };
  };

  program
    .name('release-reconciler')
    .description('Promote charm and snap revisions through their release channels')
    .addOption(new Option('--log-level <level>', 'minimum log level').argParser(parseLogLevelOption))
    .hook('preAction', () => {
      const { logLevel } = program.opts<{ logLevel?: LogLevel }>();
      setLogLevel(logLevel ?? load().config.logLevel);
    });

  trackSelectionOptions(
    program
      .command('charm-release')
      .description('Test candidate bundles and promote them to stable once every tested cell passes'),
  )
    .option('--dry-run', 'log decisions without starting tests or promoting', false)
    .option('--results-file <path>', 'where to write non-trivial track outcomes', 'results.txt')
    .action(async (options: CharmReleaseOptions) => {
      const { config, services } = load();
      const tracks = await resolveTracks(options, services.upstream);
      if (tracks.length === 0) {
        logger.info('No tracks to process. Skipping...');
        return;
      }

      const reconciler = new TrackReconciler({
        registry: services.registry,
        testService: services.testService,
        bundleName: config.bundleName,
        components: config.bundleComponents,
        dryRun: options.dryRun,
      });
      const pass = await runReconcilePass(tracks, reconciler);
      await writeResultsFile(options.resultsFile, nonTrivialResults(pass.reports));
    });

  program
    .command('promote-tracks')
    .description('Release snap revisions to the next risk level once they have stayed long enough')
    .option('--dry-run', 'log proposals without releasing', false)
    .option('--output <path>', 'write the proposals as JSON')
    .action(async (options: PromoteTracksOptions) => {
      const { config, services } = load();
      const promoter = new RiskLadderPromoter({
        snapStore: services.snapStore,
        snapName: config.snapName,
        dryRun: options.dryRun,
      });
      const plan = await promoter.run();
      if (options.output) {
        await writeFile(options.output, JSON.stringify(plan.proposals, null, 2), 'utf-8');
      }
      logger.info('Risk ladder complete', {
        proposals: plan.proposals.length,
        approvals: plan.approvals.length,
        failed: plan.failed.map((failure) => failure.proposal.name),
      });
    });

  program
    .command('release-revision')
    .description('Release a single snap revision into a channel')
    .requiredOption('--revision <n>', 'snap revision', parseRevision)
    .requiredOption('--channel <channel>', 'target channel, e.g. 1.32/beta')
    .option('--dry-run', 'log without releasing', false)
    .action(async (options: ReleaseRevisionOptions) => {
      const { config, services } = load();
      const promoter = new RiskLadderPromoter({
        snapStore: services.snapStore,
        snapName: config.snapName,
        dryRun: options.dryRun,
      });
      await promoter.release(options.revision, options.channel);
    });

  trackSelectionOptions(
    program.command('seed-builds').description('Submit one insight build per track and report earlier builds'),
  )
    .option('--risk <risk>', 'risk level to build from', 'beta')
    .option('--arch <arch>', 'architecture to build', 'amd64')
    .option('--base <base>', 'base to build')
    .option('--state-file <path>', 'revision → build state', 'sqa_builds_state.json')
    .option('--dry-run', 'log without creating builds', false)
    .option('--results-file <path>', 'where to write per-track build status', 'results.txt')
    .action(async (options: SeedBuildsOptions) => {
      const { config, services } = load();
      const tracks = await resolveTracks(options, services.upstream);
      if (tracks.length === 0) {
        logger.info('No tracks to create builds for. Skipping...');
        return;
      }

      const seeder = new BuildSeeder({
        registry: services.registry,
        testService: services.testService,
        store: new SeedStateStore(options.stateFile),
        bundleName: config.bundleName,
        components: config.bundleComponents,
        risk: options.risk,
        arch: options.arch,
        base: options.base,
        dryRun: options.dryRun,
      });

      const results: Record<string, string> = {};
      for (const track of tracks) {
        const report = await seeder.seed(track);
        results[track] = JSON.stringify(report.results);
      }
      await writeResultsFile(options.resultsFile, results);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      logger.error('Command failed', { error: toTypedError(err) });
      process.exitCode = 1;
    });
}
