import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Command, CommanderError } from 'commander';
import { UpstreamReleases } from '../src/clients/upstream-releases';
import { buildProgram, resolveTracks, Services } from '../src/cli';
import { TestPlanInstanceStatus } from '../src/domain/test-status';
import { captureLogs, FakeRegistry, FakeSnapStore, FakeTestService } from './helpers/fakes';

class FakeUpstream implements UpstreamReleases {
  readonly calls: string[] = [];

  async listTracksAfter(after: string): Promise<string[]> {
    this.calls.push(after);
    return ['1.32', '1.33'];
  }
}

function quiet(program: Command): Command {
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  }
  return program;
}

describe('resolveTracks', () => {
  captureLogs();

  test('explicit tracks win', async () => {
    const upstream = new FakeUpstream();
    expect(await resolveTracks({ supportedTracks: ['1.30'], after: '1.32' }, upstream)).toEqual(['1.30']);
    expect(upstream.calls).toEqual([]);
  });

  test('otherwise asks upstream for tracks after the threshold', async () => {
    const upstream = new FakeUpstream();
    expect(await resolveTracks({ after: '1.32' }, upstream)).toEqual(['1.32', '1.33']);
    expect(upstream.calls).toEqual(['1.32']);
  });
});

describe('release-reconciler program', () => {
  captureLogs();
  let dir: string;
  let services: Services & { registry: FakeRegistry; testService: FakeTestService; snapStore: FakeSnapStore };
  let upstream: FakeUpstream;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cli-'));
    upstream = new FakeUpstream();
    services = {
      registry: new FakeRegistry(),
      testService: new FakeTestService(),
      snapStore: new FakeSnapStore(),
      upstream,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function program(): Command {
    return quiet(buildProgram(() => services, {}));
  }

  test('charm-release writes non-trivial outcomes to the results file', async () => {
    services.registry.publish('k8s', '1.32/candidate', [{ arch: 'amd64', base: '22.04', revision: 741 }]);
    services.registry.publish('k8s-worker', '1.32/candidate', [{ arch: 'amd64', base: '22.04', revision: 742 }]);
    services.testService.addInstance(
      '1.32/candidate',
      'k8s-operator-k8s-741-k8s-worker-742',
      TestPlanInstanceStatus.Passed,
    );
    const resultsFile = join(dir, 'results.txt');

    await program().parseAsync(['charm-release', '--supported-tracks', '1.32', '1.33', '--results-file', resultsFile], {
      from: 'user',
    });

    expect(await readFile(resultsFile, 'utf-8')).toBe('1.32=process_success\n');
    expect(services.registry.promotions).toHaveLength(2);
    expect(upstream.calls).toEqual([]);
  });

  test('charm-release defaults to upstream tracks after 1.32', async () => {
    await program().parseAsync(['charm-release', '--dry-run', '--results-file', join(dir, 'results.txt')], {
      from: 'user',
    });

    expect(upstream.calls).toEqual(['1.32']);
  });

  test('--supported-tracks and --after are mutually exclusive', async () => {
    await expect(
      program().parseAsync(['charm-release', '--supported-tracks', '1.32', '--after', '1.30'], { from: 'user' }),
    ).rejects.toBeInstanceOf(CommanderError);
  });

  test('release-revision releases one revision of the configured snap', async () => {
    await program().parseAsync(['release-revision', '--revision', '1234', '--channel', '1.32/beta'], { from: 'user' });

    expect(services.snapStore.released).toEqual([['k8s', 1234, '1.32/beta']]);
  });

  test('release-revision rejects a non-numeric revision', async () => {
    await expect(
      program().parseAsync(['release-revision', '--revision', 'abc', '--channel', '1.32/beta'], { from: 'user' }),
    ).rejects.toBeInstanceOf(CommanderError);
  });

  test('promote-tracks writes proposals as JSON', async () => {
    services.snapStore.entries = [
      {
        track: '1.32',
        risk: 'edge',
        architecture: 'amd64',
        revision: 10,
        version: '1.32.2',
        releasedAt: new Date('2020-01-01T00:00:00Z'),
      },
    ];
    const output = join(dir, 'proposals.json');

    await program().parseAsync(['promote-tracks', '--dry-run', '--output', output], { from: 'user' });

    const proposals: Array<{ name: string; toChannel: string }> = JSON.parse(await readFile(output, 'utf-8'));
    expect(proposals.map((p) => [p.name, p.toChannel])).toEqual([['k8s-1.32-beta-amd64', '1.32/beta']]);
    expect(services.snapStore.released).toEqual([]);
  });

  test('seed-builds records builds in the state file', async () => {
    services.registry.publish('k8s', '1.32/beta', [{ arch: 'amd64', base: '22.04', revision: 741 }]);
    services.registry.publish('k8s-worker', '1.32/beta', [{ arch: 'amd64', base: '22.04', revision: 742 }]);
    const stateFile = join(dir, 'state.json');
    const resultsFile = join(dir, 'results.txt');

    await program().parseAsync(
      ['seed-builds', '--supported-tracks', '1.32', '--state-file', stateFile, '--results-file', resultsFile],
      { from: 'user' },
    );

    expect(JSON.parse(await readFile(stateFile, 'utf-8'))['741'].jobId).toBe('build-1');
    expect(await readFile(resultsFile, 'utf-8')).toBe(
      '1.32={"741":"status: queued result: None uuid: build-1"}\n',
    );
  });

  test('an unknown log level is rejected', async () => {
    await expect(
      program().parseAsync(['--log-level', 'loud', 'release-revision', '--revision', '1', '--channel', 'x'], {
        from: 'user',
      }),
    ).rejects.toBeInstanceOf(CommanderError);
  });
});
