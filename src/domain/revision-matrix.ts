/**
 * Revision matrix domain model.
 *
 * For each (name, channel, arch, base) there is at most one published
 * artifact revision. A RevisionMatrix holds the (arch, base) → revision
 * table for one component in one channel. Rows are architectures, columns
 * are bases:
 *
 *           20.04   22.04   24.04
 *   amd64   741     742     743
 *   arm64   736     748     750
 */

/** Opaque artifact revision as published by the registry. */
export type Revision = string | number;

/** One populated cell of a matrix. */
export interface MatrixCell {
  arch: string;
  base: string;
  revision: Revision;
}

function cellKey(arch: string, base: string): string {
  return `${arch}\u0000${base}`;
}

function isPresent(revision: Revision | undefined): revision is Revision {
  return revision !== undefined && revision !== '';
}

export class RevisionMatrix {
  private readonly data = new Map<string, MatrixCell>();

  /** Build a matrix from a list of cells. */
  static from(cells: Iterable<MatrixCell>): RevisionMatrix {
    const matrix = new RevisionMatrix();
    for (const cell of cells) {
      matrix.set(cell.arch, cell.base, cell.revision);
    }
    return matrix;
  }

  set(arch: string, base: string, revision: Revision): void {
    this.data.set(cellKey(arch, base), { arch, base, revision });
  }

  get(arch: string, base: string): Revision | undefined {
    return this.data.get(cellKey(arch, base))?.revision;
  }

  /** Whether the (arch, base) cell carries a non-empty revision. */
  has(arch: string, base: string): boolean {
    return isPresent(this.get(arch, base));
  }

  getArchs(): Set<string> {
    return new Set([...this.data.values()].map((cell) => cell.arch));
  }

  getBases(): Set<string> {
    return new Set([...this.data.values()].map((cell) => cell.base));
  }

  /** Recorded cells, sorted by arch then base. */
  cells(): MatrixCell[] {
    return [...this.data.values()]
      .map((cell) => ({ ...cell }))
      .sort((a, b) => a.arch.localeCompare(b.arch) || a.base.localeCompare(b.base));
  }

  get size(): number {
    return this.data.size;
  }

  /** Structural equality over the full (arch, base) → revision mapping. */
  equals(other: RevisionMatrix): boolean {
    if (this.data.size !== other.data.size) return false;
    for (const [key, cell] of this.data) {
      const theirs = other.data.get(key);
      if (!theirs || theirs.revision !== cell.revision) return false;
    }
    return true;
  }

  /**
   * A matrix is usable for reconciliation only when it has at least one
   * cell and every recorded cell holds a revision.
   */
  isPopulated(): boolean {
    if (this.data.size === 0) return false;
    return [...this.data.values()].every((cell) => isPresent(cell.revision));
  }

  /** Tab-separated table: header of sorted bases, one row per sorted arch. */
  toString(): string {
    const archs = [...this.getArchs()].sort();
    const bases = [...this.getBases()].sort();
    const lines = ['\t' + bases.join('\t')];
    for (const arch of archs) {
      const row = [arch, ...bases.map((base) => String(this.get(arch, base) ?? ''))];
      lines.push(row.join('\t'));
    }
    return lines.join('\n');
  }

  toJSON(): MatrixCell[] {
    return this.cells();
  }
}

/** Compare two string sets for equality. */
export function sameSet(a: Set<string>, b: Set<string>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}
