import { HttpClient } from '../../src/clients/http';
import { SnapStoreClient } from '../../src/clients/snapstore';
import { commandFailedError, InvariantError, PromotionError, TestServiceError } from '../../src/domain/errors';
import { FakeCommandRunner } from '../helpers/commands';
import { captureLogs } from '../helpers/fakes';
import { fakeFetch, response } from '../helpers/http';

function client(body: unknown, commands = new FakeCommandRunner()) {
  const { fetchFn, requests } = fakeFetch(() => response(200, body));
  return {
    requests,
    commands,
    store: new SnapStoreClient({
      http: new HttpClient({ domain: 'REGISTRY', timeoutMs: 1000, fetchFn }),
      commands,
      baseUrl: 'https://snapstore.test',
      snapcraftBin: 'snapcraft',
    }),
  };
}

describe('SnapStoreClient', () => {
  captureLogs();

  test('reads the channel map', async () => {
    const { store, requests } = client({
      'channel-map': [
        {
          channel: {
            architecture: 'amd64',
            name: '1.32/beta',
            risk: 'beta',
            track: '1.32',
            'released-at': '2026-01-05T10:00:00.000+00:00',
          },
          revision: 1234,
          version: 'v1.32.1',
        },
        {
          channel: { architecture: 'arm64', name: '1.32/edge', risk: 'edge', track: '1.32', 'released-at': null },
          revision: 1235,
          version: 'v1.32.2',
        },
      ],
    });

    const entries = await store.channelMap('k8s');

    expect(requests[0].url).toBe('https://snapstore.test/v2/snaps/info/k8s');
    expect(requests[0].headers['Snap-Device-Series']).toBe('16');
    expect(entries).toEqual([
      {
        track: '1.32',
        risk: 'beta',
        architecture: 'amd64',
        revision: 1234,
        version: 'v1.32.1',
        releasedAt: new Date('2026-01-05T10:00:00Z'),
      },
      { track: '1.32', risk: 'edge', architecture: 'arm64', revision: 1235, version: 'v1.32.2', releasedAt: undefined },
    ]);
  });

  test('a body without a channel map is an invariant failure', async () => {
    const { store } = client({ name: 'k8s' });
    await expect(store.channelMap('k8s')).rejects.toBeInstanceOf(InvariantError);
  });

  test('releases a single revision with snapcraft', async () => {
    const { store, commands } = client({});

    await store.releaseRevision('k8s', 1234, '1.32/candidate');

    expect(commands.calls).toEqual([{ command: 'snapcraft', args: ['release', 'k8s', '1234', '1.32/candidate'] }]);
  });

  test('a failed release is a promotion error', async () => {
    const commands = new FakeCommandRunner(
      () => new TestServiceError(commandFailedError('snapcraft', ['release'], 2, 'no permission', false)),
    );
    const { store } = client({}, commands);

    await expect(store.releaseRevision('k8s', 1234, '1.32/candidate')).rejects.toBeInstanceOf(PromotionError);
  });
});
