/**
 * Bundle domain model.
 *
 * A bundle is the set of components that must be tested together, e.g. the
 * k8s-operator bundle made of the `k8s` and `k8s-worker` charms. It holds one
 * RevisionMatrix per component and derives the composite version key the
 * test service uses to correlate test runs.
 */

import { createTypedError, InvariantError } from './errors';
import { Revision, RevisionMatrix, sameSet } from './revision-matrix';

export class Bundle {
  private readonly data = new Map<string, RevisionMatrix | null>();

  constructor(public readonly name: string) {}

  /** Set (or clear, with null) the matrix of a component. */
  set(component: string, matrix: RevisionMatrix | null): void {
    this.data.set(component, matrix);
  }

  get(component: string): RevisionMatrix | null {
    return this.data.get(component) ?? null;
  }

  /** Component names in stable sorted order. */
  components(): string[] {
    return [...this.data.keys()].sort();
  }

  isTestable(): boolean {
    return this.explainUntestable() === null;
  }

  /**
   * Describe which testability invariant fails, or null when the bundle can
   * be tested as a unit.
   */
  explainUntestable(): string | null {
    if (this.data.size === 0) return 'bundle has no components';

    const matrices: Array<[string, RevisionMatrix]> = [];
    for (const component of this.components()) {
      const matrix = this.data.get(component);
      if (!matrix) return `component ${component} has no revision matrix`;
      matrices.push([component, matrix]);
    }

    const [referenceName, reference] = matrices[0];
    const archs = reference.getArchs();
    const bases = reference.getBases();

    for (const [component, matrix] of matrices) {
      if (!sameSet(matrix.getArchs(), archs)) {
        return `component ${component} spans different architectures than ${referenceName}`;
      }
      if (!sameSet(matrix.getBases(), bases)) {
        return `component ${component} spans different bases than ${referenceName}`;
      }
    }

    for (const arch of archs) {
      for (const base of bases) {
        const covered = matrices.filter(([, matrix]) => matrix.has(arch, base));
        if (covered.length > 0 && covered.length < matrices.length) {
          const missing = matrices
            .filter(([, matrix]) => !matrix.has(arch, base))
            .map(([component]) => component);
          return `cell ${arch}/${base} has no revision for ${missing.join(', ')}`;
        }
      }
    }

    return null;
  }

  getArchs(): Set<string> {
    return this.reference().getArchs();
  }

  getBases(): Set<string> {
    return this.reference().getBases();
  }

  /** Component → revision for one cell. Components without a revision are omitted. */
  getRevisions(arch: string, base: string): Record<string, Revision> {
    const revisions: Record<string, Revision> = {};
    for (const component of this.components()) {
      const revision = this.data.get(component)?.get(arch, base);
      if (revision !== undefined && revision !== '') {
        revisions[component] = revision;
      }
    }
    return revisions;
  }

  /**
   * Composite version key, e.g. `k8s-operator-k8s-741-k8s-worker-742`.
   * Undefined when any component lacks a revision for the cell.
   */
  getVersion(arch: string, base: string): string | undefined {
    const components = this.components();
    if (components.length === 0) return undefined;

    let version = this.name;
    for (const component of components) {
      const matrix = this.data.get(component);
      if (!matrix || !matrix.has(arch, base)) return undefined;
      version += `-${component}-${matrix.get(arch, base)}`;
    }
    return version;
  }

  /** First component's matrix; callers must have established testability. */
  private reference(): RevisionMatrix {
    const first = this.components()[0];
    const matrix = first === undefined ? null : this.data.get(first);
    if (!matrix) {
      throw new InvariantError(
        createTypedError({
          code: 'INVARIANT.BUNDLE_EMPTY',
          message: `Bundle ${this.name} has no revision matrix to read axes from`,
          details: { bundle: this.name, components: this.components() },
        }),
      );
    }
    return matrix;
  }
}
