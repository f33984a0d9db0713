/**
 * Upstream Kubernetes release tags, used to derive the tracks to process
 * when no explicit list is given.
 */

import { z } from 'zod';
import { compareMinor, parseMinorVersion } from '../domain/channel';
import {
  ConfigError,
  createTypedError,
  InvariantError,
  malformedResponseError,
  QueryError,
} from '../domain/errors';
import { logger } from '../logger';
import { HttpClient, parseJsonBody } from './http';

export interface UpstreamReleases {
  /** Every `major.minor` track at or after `after`, ascending. */
  listTracksAfter(after: string): Promise<string[]>;
}

/** Retry policy for the tags API. */
export const TAGS_RETRY = { maxAttempts: 3, backoffBaseMs: 1_000, backoffMaxMs: 10_000 };
export const TAGS_TIMEOUT_MS = 30_000;

const TagsPageSchema = z.array(z.object({ name: z.string() }));

/** Extract the `rel="next"` target of a Link header. */
export function nextPageUrl(link: string | null): string | null {
  if (!link) return null;
  for (const part of link.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match) return match[1];
  }
  return null;
}

/** A tag without a pre-release suffix (`v1.30.1`, not `v1.30.0-alpha.1`). */
export function isStableRelease(tag: string): boolean {
  return !tag.includes('-');
}

export interface GithubReleasesOptions {
  http: HttpClient;
  apiUrl: string;
  repository?: string;
  token?: string;
}

const log = logger.child({ module: 'upstream-releases' });

export class GithubReleases implements UpstreamReleases {
  constructor(private readonly options: GithubReleasesOptions) {}

  /** All tag names, following pagination. */
  async listTags(): Promise<string[]> {
    const repository = this.options.repository ?? 'kubernetes/kubernetes';
    const headers: Record<string, string> = { Accept: 'application/vnd.github+json' };
    if (this.options.token) headers.Authorization = `token ${this.options.token}`;

    const names: string[] = [];
    let url: string | null = `${this.options.apiUrl}/repos/${repository}/tags?per_page=100`;

    while (url) {
      const result = this.options.http.ensureOk(await this.options.http.request(url, { headers }));
      const parsed = TagsPageSchema.safeParse(parseJsonBody(result));
      if (!parsed.success) {
        throw new InvariantError(malformedResponseError('github tags', parsed.error.issues.map((issue) => issue.message)));
      }
      if (parsed.data.length === 0 && names.length === 0) {
        throw new QueryError(
          createTypedError({ code: 'UPSTREAM.NO_TAGS', message: `No tags retrieved for ${repository}`, retryable: true }),
        );
      }
      names.push(...parsed.data.map((tag) => tag.name));
      url = nextPageUrl(result.headers.get('Link'));
    }

    return names;
  }

  async listTracksAfter(after: string): Promise<string[]> {
    const least = parseMinorVersion(after);
    if (!least) {
      throw new ConfigError(
        createTypedError({
          code: 'CONFIG.INVALID_VERSION',
          message: `${after} is not a valid version`,
          details: { after },
        }),
      );
    }

    log.info('Listing upstream releases', { after });

    const tracks = new Map<string, [number, number]>();
    for (const tag of await this.listTags()) {
      if (!isStableRelease(tag)) continue;
      const minor = parseMinorVersion(tag);
      if (!minor || compareMinor(minor, least) < 0) continue;
      tracks.set(`${minor[0]}.${minor[1]}`, minor);
    }

    return [...tracks.entries()].sort(([, a], [, b]) => compareMinor(a, b)).map(([track]) => track);
  }
}
