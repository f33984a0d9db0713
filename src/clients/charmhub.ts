/**
 * Charmhub package registry client.
 *
 * Revision lookups go through the public refresh API, one request per
 * (arch, base) cell. Promotion shells out to charmcraft, which moves every
 * revision of a channel at once.
 */

import { z } from 'zod';
import {
  InvariantError,
  malformedResponseError,
  PromotionError,
  promotionFailedError,
  ReleaseError,
} from '../domain/errors';
import { Revision, RevisionMatrix } from '../domain/revision-matrix';
import { logger } from '../logger';
import { CommandRunner } from './command';
import { HttpClient, parseJsonBody } from './http';

/** Package registry operations the reconciler depends on. */
export interface PackageRegistry {
  /** Revisions of a component in a channel for every known (arch, base). */
  getRevisionMatrix(component: string, channel: string): Promise<RevisionMatrix>;
  /** Release everything in `fromChannel` to `toChannel` as well. */
  promote(component: string, fromChannel: string, toChannel: string): Promise<void>;
}

export const DEFAULT_BASES: readonly string[] = ['20.04', '22.04', '24.04', '26.04', '28.04', '30.04'];
export const DEFAULT_ARCHS: readonly string[] = ['amd64', 'arm64'];

const RefreshResponseSchema = z.object({
  results: z
    .array(
      z.object({
        result: z.string().optional(),
        charm: z
          .object({
            revision: z.union([z.number(), z.string()]).optional(),
          })
          .passthrough()
          .optional(),
      }),
    )
    .min(1),
});

export interface CharmhubRegistryOptions {
  http: HttpClient;
  commands: CommandRunner;
  baseUrl: string;
  charmcraftBin: string;
  bases?: readonly string[];
  archs?: readonly string[];
}

const log = logger.child({ module: 'charmhub' });

export class CharmhubRegistry implements PackageRegistry {
  private readonly bases: readonly string[];
  private readonly archs: readonly string[];

  constructor(private readonly options: CharmhubRegistryOptions) {
    this.bases = options.bases ?? DEFAULT_BASES;
    this.archs = options.archs ?? DEFAULT_ARCHS;
  }

  /**
   * Revision of a charm for one (channel, arch, base). A 4xx answer means
   * nothing is published there; transport failures and 5xx throw.
   */
  async findRevision(charm: string, channel: string, arch: string, base: string): Promise<Revision | undefined> {
    log.debug('Querying revision', { charm, channel, arch, base });

    const result = await this.options.http.request(`${this.options.baseUrl}/v2/charms/refresh`, {
      method: 'POST',
      json: {
        actions: [
          {
            action: 'install',
            base: { architecture: arch, channel: base, name: 'ubuntu' },
            channel,
            name: charm,
            'instance-key': 'query',
          },
        ],
        context: [],
      },
    });

    if (result.status >= 400 && result.status < 500) return undefined;
    this.options.http.ensureOk(result);

    const parsed = RefreshResponseSchema.safeParse(parseJsonBody(result));
    if (!parsed.success) {
      throw new InvariantError(
        malformedResponseError('charmhub refresh', parsed.error.issues.map((issue) => issue.message)),
      );
    }

    const entry = parsed.data.results[0];
    if (entry.result === 'error') return undefined;
    return entry.charm?.revision;
  }

  async getRevisionMatrix(component: string, channel: string): Promise<RevisionMatrix> {
    log.info('Querying revision matrix', { charm: component, channel });

    const matrix = new RevisionMatrix();
    for (const base of this.bases) {
      for (const arch of this.archs) {
        const revision = await this.findRevision(component, channel, arch, base);
        if (revision !== undefined && revision !== '') {
          matrix.set(arch, base, revision);
        }
      }
    }
    return matrix;
  }

  async promote(component: string, fromChannel: string, toChannel: string): Promise<void> {
    log.info('Promoting charm', { charm: component, from: fromChannel, to: toChannel });
    try {
      await this.options.commands.run(this.options.charmcraftBin, ['promote', component, fromChannel, toChannel]);
    } catch (err) {
      if (err instanceof ReleaseError) {
        throw new PromotionError(promotionFailedError(component, fromChannel, toChannel, err.typedError));
      }
      throw err;
    }
  }
}
