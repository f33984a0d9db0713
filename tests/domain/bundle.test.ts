import { Bundle } from '../../src/domain/bundle';
import { InvariantError } from '../../src/domain/errors';
import { RevisionMatrix } from '../../src/domain/revision-matrix';

function bundleOf(k8s: RevisionMatrix | null, worker: RevisionMatrix | null): Bundle {
  const bundle = new Bundle('k8s-operator');
  bundle.set('k8s', k8s);
  bundle.set('k8s-worker', worker);
  return bundle;
}

const k8s = () =>
  RevisionMatrix.from([
    { arch: 'amd64', base: '22.04', revision: 741 },
    { arch: 'amd64', base: '24.04', revision: 743 },
  ]);

const worker = () =>
  RevisionMatrix.from([
    { arch: 'amd64', base: '22.04', revision: 742 },
    { arch: 'amd64', base: '24.04', revision: 744 },
  ]);

describe('Bundle', () => {
  test('components are sorted', () => {
    const bundle = new Bundle('b');
    bundle.set('zeta', null);
    bundle.set('alpha', null);
    expect(bundle.components()).toEqual(['alpha', 'zeta']);
  });

  test('get returns null for unknown components', () => {
    expect(new Bundle('b').get('missing')).toBeNull();
  });

  describe('testability', () => {
    test('matching matrices are testable', () => {
      const bundle = bundleOf(k8s(), worker());
      expect(bundle.isTestable()).toBe(true);
      expect(bundle.explainUntestable()).toBeNull();
    });

    test('empty bundle is not testable', () => {
      expect(new Bundle('b').explainUntestable()).toBe('bundle has no components');
    });

    test('a component without a matrix is not testable', () => {
      expect(bundleOf(k8s(), null).explainUntestable()).toBe('component k8s-worker has no revision matrix');
    });

    test('differing architectures are not testable', () => {
      const armWorker = worker();
      armWorker.set('arm64', '22.04', 750);
      expect(bundleOf(k8s(), armWorker).explainUntestable()).toBe(
        'component k8s-worker spans different architectures than k8s',
      );
    });

    test('differing bases are not testable', () => {
      const shortWorker = RevisionMatrix.from([{ arch: 'amd64', base: '22.04', revision: 742 }]);
      expect(bundleOf(k8s(), shortWorker).explainUntestable()).toBe(
        'component k8s-worker spans different bases than k8s',
      );
    });

    test('a cell covered by only some components is not testable', () => {
      const holey = worker();
      holey.set('amd64', '24.04', '');
      expect(bundleOf(k8s(), holey).explainUntestable()).toBe('cell amd64/24.04 has no revision for k8s-worker');
    });
  });

  test('axes come from the first component', () => {
    const bundle = bundleOf(k8s(), worker());
    expect([...bundle.getArchs()]).toEqual(['amd64']);
    expect([...bundle.getBases()].sort()).toEqual(['22.04', '24.04']);
  });

  test('axes of an empty bundle raise an invariant error', () => {
    expect(() => new Bundle('b').getArchs()).toThrow(InvariantError);
  });

  test('getRevisions maps component to revision for one cell', () => {
    expect(bundleOf(k8s(), worker()).getRevisions('amd64', '22.04')).toEqual({ k8s: 741, 'k8s-worker': 742 });
  });

  test('getRevisions omits components without a revision', () => {
    const partial = RevisionMatrix.from([{ arch: 'amd64', base: '24.04', revision: 744 }]);
    expect(bundleOf(k8s(), partial).getRevisions('amd64', '22.04')).toEqual({ k8s: 741 });
  });

  test('getVersion joins name with sorted component revisions', () => {
    expect(bundleOf(k8s(), worker()).getVersion('amd64', '22.04')).toBe('k8s-operator-k8s-741-k8s-worker-742');
  });

  test('getVersion is undefined when any component lacks the cell', () => {
    const partial = RevisionMatrix.from([{ arch: 'amd64', base: '24.04', revision: 744 }]);
    expect(bundleOf(k8s(), partial).getVersion('amd64', '22.04')).toBeUndefined();
  });

  test('getVersion distinguishes bundles differing in one component', () => {
    const bumped = worker();
    bumped.set('amd64', '22.04', 760);
    expect(bundleOf(k8s(), bumped).getVersion('amd64', '22.04')).not.toBe(
      bundleOf(k8s(), worker()).getVersion('amd64', '22.04'),
    );
  });
});
