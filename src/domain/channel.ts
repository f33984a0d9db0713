/**
 * Channel and risk ladder definitions.
 *
 * A channel is a track plus a risk level (`1.32/candidate`). Revisions move
 * one risk level at a time: edge → beta → candidate → stable.
 */

export type Risk = 'edge' | 'beta' | 'candidate' | 'stable';

export const RISK_LEVELS: readonly Risk[] = ['edge', 'beta', 'candidate', 'stable'];

/** Minimum whole days a revision stays at a risk level before auto-promotion. */
export const DAYS_TO_STAY_IN_RISK: Record<Exclude<Risk, 'stable'>, number> = {
  edge: 1,
  beta: 3,
  candidate: 5,
};

/** Tracks the risk ladder never touches. */
export const IGNORE_TRACKS: readonly string[] = ['latest'];

/** The only architecture the test service can currently tell apart. */
export const SUPPORTED_TEST_ARCH = 'amd64';

export function isRisk(value: string): value is Risk {
  return RISK_LEVELS.some((risk) => risk === value);
}

/** Next risk level, or null at the top of the ladder. */
export function nextRisk(risk: Risk): Risk | null {
  const index = RISK_LEVELS.indexOf(risk);
  return RISK_LEVELS[index + 1] ?? null;
}

export function channelName(track: string, risk: string): string {
  return `${track}/${risk}`;
}

/** Track of a channel name (`1.32/beta` → `1.32`). */
export function trackOf(channel: string): string {
  return channel.split('/')[0];
}

/** Parse `major.minor` from a track or version string (`v1.32.1`, `1.32`). */
export function parseMinorVersion(value: string): [number, number] | null {
  const match = /^v?(\d+)\.(\d+)/.exec(value.trim());
  if (!match) return null;
  return [Number(match[1]), Number(match[2])];
}

/** Compare two `major.minor` tuples. */
export function compareMinor(a: [number, number], b: [number, number]): number {
  return a[0] - b[0] || a[1] - b[1];
}

/** How component names map to deployed application names in test configuration. */
export enum AppNamePolicy {
  Identity = 'identity',
  HyphenToUnderscore = 'hyphen_to_underscore',
}

/** Tracks up to and including this one deploy applications with underscore names. */
export const UNDERSCORE_APP_NAMES_UNTIL: [number, number] = [1, 32];

export function appNamePolicyForTrack(track: string): AppNamePolicy {
  const minor = parseMinorVersion(track);
  if (minor && compareMinor(minor, UNDERSCORE_APP_NAMES_UNTIL) <= 0) {
    return AppNamePolicy.HyphenToUnderscore;
  }
  return AppNamePolicy.Identity;
}

export function applyAppNamePolicy(policy: AppNamePolicy, name: string): string {
  switch (policy) {
    case AppNamePolicy.HyphenToUnderscore:
      return name.replace(/-/g, '_');
    case AppNamePolicy.Identity:
      return name;
  }
}
