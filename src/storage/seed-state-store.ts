/**
 * Seed state store: which first-component revisions already have an
 * insight build, persisted as a JSON file.
 */

import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../logger';

export interface SeedRecord {
  jobId: string;
  channel?: string;
  arch?: string;
  base?: string;
  submittedAt?: string;
}

/** Revision → recorded build. */
export type SeedState = Record<string, SeedRecord>;

const SeedRecordSchema = z.object({
  jobId: z.string(),
  channel: z.string().optional(),
  arch: z.string().optional(),
  base: z.string().optional(),
  submittedAt: z.string().optional(),
});

// Older state files map revisions straight to job ids.
const SeedStateSchema = z.record(
  z.union([z.string().transform((jobId): SeedRecord => ({ jobId })), SeedRecordSchema]),
);

const log = logger.child({ module: 'seed-state-store' });

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class SeedStateStore {
  constructor(readonly path: string) {}

  /** Load the state. Missing, empty or malformed files yield an empty state. */
  async load(): Promise<SeedState> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        log.info('No state file found', { path: this.path });
        return {};
      }
      throw err;
    }

    if (content.trim().length === 0) {
      log.info('State file is empty', { path: this.path });
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      log.warn('State file is not valid JSON, starting empty', {
        path: this.path,
        reason: err instanceof Error ? err.message : String(err),
      });
      return {};
    }

    const parsed = SeedStateSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('State file has an unexpected shape, starting empty', {
        path: this.path,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return {};
    }
    return parsed.data;
  }

  async save(state: SeedState): Promise<void> {
    await writeFile(this.path, JSON.stringify(state, null, 4), 'utf-8');
  }
}
