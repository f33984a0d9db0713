/**
 * Snap store client: channel-map metadata and single-revision releases.
 */

import { z } from 'zod';
import { InvariantError, malformedResponseError, PromotionError, promotionFailedError, ReleaseError } from '../domain/errors';
import { logger } from '../logger';
import { CommandRunner } from './command';
import { HttpClient, parseJsonBody } from './http';

/** One (track, risk, architecture) entry of a snap's channel map. */
export interface ChannelMapEntry {
  track: string;
  risk: string;
  architecture: string;
  revision: number;
  version: string;
  /** When the revision was released into this channel; absent for closed channels. */
  releasedAt?: Date;
}

export interface SnapStore {
  channelMap(snap: string): Promise<ChannelMapEntry[]>;
  /** Release one revision into one channel. */
  releaseRevision(snap: string, revision: number, channel: string): Promise<void>;
}

const ChannelMapSchema = z.object({
  'channel-map': z.array(
    z.object({
      channel: z.object({
        architecture: z.string(),
        name: z.string(),
        risk: z.string(),
        track: z.string(),
        'released-at': z.string().nullish(),
      }),
      revision: z.number().int(),
      version: z.string(),
    }),
  ),
});

/** Store API headers; the info endpoint requires a device series. */
const HEADERS: Record<string, string> = {
  'Snap-Device-Series': '16',
  'User-Agent': 'release-reconciler/0.1.0',
};

export interface SnapStoreClientOptions {
  http: HttpClient;
  commands: CommandRunner;
  baseUrl: string;
  snapcraftBin: string;
}

const log = logger.child({ module: 'snapstore' });

export class SnapStoreClient implements SnapStore {
  constructor(private readonly options: SnapStoreClientOptions) {}

  async channelMap(snap: string): Promise<ChannelMapEntry[]> {
    const result = this.options.http.ensureOk(
      await this.options.http.request(`${this.options.baseUrl}/v2/snaps/info/${encodeURIComponent(snap)}`, {
        headers: HEADERS,
      }),
    );

    const parsed = ChannelMapSchema.safeParse(parseJsonBody(result));
    if (!parsed.success) {
      throw new InvariantError(
        malformedResponseError('snap store info', parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)),
      );
    }

    return parsed.data['channel-map'].map((entry) => {
      const releasedAt = entry.channel['released-at'];
      const parsedDate = releasedAt ? new Date(releasedAt) : undefined;
      return {
        track: entry.channel.track,
        risk: entry.channel.risk,
        architecture: entry.channel.architecture,
        revision: entry.revision,
        version: entry.version,
        releasedAt: parsedDate && !Number.isNaN(parsedDate.getTime()) ? parsedDate : undefined,
      };
    });
  }

  async releaseRevision(snap: string, revision: number, channel: string): Promise<void> {
    log.info('Releasing revision', { snap, revision, channel });
    try {
      // `snapcraft promote` asks for confirmation when skipping from edge, so release the revision directly.
      await this.options.commands.run(this.options.snapcraftBin, ['release', snap, String(revision), channel]);
    } catch (err) {
      if (err instanceof ReleaseError) {
        throw new PromotionError(promotionFailedError(snap, `r${revision}`, channel, err.typedError));
      }
      throw err;
    }
  }
}
