import { CharmhubRegistry } from '../../src/clients/charmhub';
import { HttpClient } from '../../src/clients/http';
import { commandFailedError, InvariantError, PromotionError, QueryError, TestServiceError } from '../../src/domain/errors';
import { FakeCommandRunner } from '../helpers/commands';
import { captureLogs } from '../helpers/fakes';
import { fakeFetch, RecordedRequest, response } from '../helpers/http';

interface RefreshAction {
  base: { architecture: string; channel: string };
  channel: string;
  name: string;
}

function actionOf(request: RecordedRequest): RefreshAction {
  const payload: { actions: RefreshAction[] } = JSON.parse(request.body ?? '{}');
  return payload.actions[0];
}

function registry(respond: (action: RefreshAction) => ReturnType<typeof response>, commands = new FakeCommandRunner()) {
  const { fetchFn, requests } = fakeFetch((request) => respond(actionOf(request)));
  return {
    requests,
    commands,
    registry: new CharmhubRegistry({
      http: new HttpClient({ domain: 'REGISTRY', timeoutMs: 1000, fetchFn }),
      commands,
      baseUrl: 'https://charmhub.test',
      charmcraftBin: 'charmcraft',
      bases: ['22.04', '24.04'],
      archs: ['amd64', 'arm64'],
    }),
  };
}

describe('CharmhubRegistry', () => {
  captureLogs();

  test('builds a matrix from one refresh query per cell', async () => {
    const revisions: Record<string, number> = {
      'amd64/22.04': 741,
      'amd64/24.04': 743,
      'arm64/22.04': 745,
    };
    const { registry: charmhub, requests } = registry((action) => {
      const revision = revisions[`${action.base.architecture}/${action.base.channel}`];
      return revision === undefined
        ? response(200, { results: [{ result: 'error', error: { code: 'revision-not-found' } }] })
        : response(200, { results: [{ charm: { revision } }] });
    });

    const matrix = await charmhub.getRevisionMatrix('k8s', '1.32/candidate');

    expect(matrix.toString()).toBe('\t22.04\t24.04\namd64\t741\t743\narm64\t745\t');
    expect(requests).toHaveLength(4);
    expect(requests[0].url).toBe('https://charmhub.test/v2/charms/refresh');
    expect(actionOf(requests[0])).toEqual({
      action: 'install',
      base: { architecture: 'amd64', channel: '22.04', name: 'ubuntu' },
      channel: '1.32/candidate',
      name: 'k8s',
      'instance-key': 'query',
    });
  });

  test('4xx answers mean no revision', async () => {
    const { registry: charmhub } = registry(() => response(404, { 'error-list': [] }));

    const matrix = await charmhub.getRevisionMatrix('k8s', '1.99/candidate');

    expect(matrix.size).toBe(0);
    expect(matrix.isPopulated()).toBe(false);
  });

  test('5xx answers are query failures', async () => {
    const { registry: charmhub } = registry(() => response(503, 'unavailable'));

    await expect(charmhub.getRevisionMatrix('k8s', '1.32/candidate')).rejects.toBeInstanceOf(QueryError);
  });

  test('an unexpected body is an invariant failure', async () => {
    const { registry: charmhub } = registry(() => response(200, { results: [] }));

    await expect(charmhub.findRevision('k8s', '1.32/candidate', 'amd64', '22.04')).rejects.toBeInstanceOf(
      InvariantError,
    );
  });

  test('promote runs charmcraft promote', async () => {
    const { registry: charmhub, commands } = registry(() => response(200, {}));

    await charmhub.promote('k8s-worker', '1.32/candidate', '1.32/stable');

    expect(commands.calls).toEqual([
      { command: 'charmcraft', args: ['promote', 'k8s-worker', '1.32/candidate', '1.32/stable'] },
    ]);
  });

  test('a failed promote is a promotion error', async () => {
    const commands = new FakeCommandRunner(
      () => new TestServiceError(commandFailedError('charmcraft', ['promote'], 1, 'denied', false)),
    );
    const { registry: charmhub } = registry(() => response(200, {}), commands);

    const result = charmhub.promote('k8s', '1.32/candidate', '1.32/stable');

    await expect(result).rejects.toBeInstanceOf(PromotionError);
    await expect(result).rejects.toMatchObject({
      typedError: { code: 'PROMOTION.COMMAND_FAILED', details: { component: 'k8s', cause: 'TEST_SERVICE.COMMAND.FAILED' } },
    });
  });
});
