/**
 * Test-plan-instance status values reported by the QA test service.
 *
 * Behavioural traits (failed / succeeded / in progress) live in a lookup
 * table rather than on the enum so the track reduction can be tested in
 * isolation.
 */

import { createTypedError, InvariantError } from './errors';

export enum TestPlanInstanceStatus {
  InProgress = 'In Progress',
  Skipped = 'skipped',
  Error = 'error',
  Aborted = 'aborted',
  Failure = 'failure',
  Success = 'success',
  Unknown = 'unknown',
  Passed = 'Passed',
  Failed = 'Failed',
  Released = 'Released',
}

export interface StatusTraits {
  failed: boolean;
  succeeded: boolean;
  inProgress: boolean;
}

const NEUTRAL: StatusTraits = { failed: false, succeeded: false, inProgress: false };

export const STATUS_TRAITS: Record<TestPlanInstanceStatus, StatusTraits> = {
  [TestPlanInstanceStatus.InProgress]: { ...NEUTRAL, inProgress: true },
  [TestPlanInstanceStatus.Skipped]: NEUTRAL,
  [TestPlanInstanceStatus.Error]: { ...NEUTRAL, failed: true },
  [TestPlanInstanceStatus.Aborted]: NEUTRAL,
  [TestPlanInstanceStatus.Failure]: { ...NEUTRAL, failed: true },
  [TestPlanInstanceStatus.Success]: NEUTRAL,
  [TestPlanInstanceStatus.Unknown]: NEUTRAL,
  [TestPlanInstanceStatus.Passed]: { ...NEUTRAL, succeeded: true },
  [TestPlanInstanceStatus.Failed]: { ...NEUTRAL, failed: true },
  [TestPlanInstanceStatus.Released]: NEUTRAL,
};

export function statusTraits(status: TestPlanInstanceStatus): StatusTraits {
  return STATUS_TRAITS[status];
}

/**
 * Resolver precedence. Each tier lists the statuses queried together and the
 * status reported when any instance matches. Aborted instances carry no
 * information about a track and are never queried.
 */
export const STATUS_PRECEDENCE: ReadonlyArray<{
  report: TestPlanInstanceStatus;
  query: readonly TestPlanInstanceStatus[];
}> = [
  { report: TestPlanInstanceStatus.Passed, query: [TestPlanInstanceStatus.Passed] },
  { report: TestPlanInstanceStatus.InProgress, query: [TestPlanInstanceStatus.InProgress] },
  { report: TestPlanInstanceStatus.Failed, query: [TestPlanInstanceStatus.Failed, TestPlanInstanceStatus.Error] },
];

/** Parse a status name case-insensitively. Unknown names break the service contract. */
export function parseTestStatus(name: string): TestPlanInstanceStatus {
  const normalized = name.trim().toLowerCase();
  const match = Object.values(TestPlanInstanceStatus).find((status) => status.toLowerCase() === normalized);
  if (!match) {
    throw new InvariantError(
      createTypedError({
        code: 'INVARIANT.UNKNOWN_TEST_STATUS',
        message: `Invalid test plan instance status: ${name}`,
        details: { status: name },
      }),
    );
  }
  return match;
}

/** Status name as the test-service CLI expects it in `--status` filters. */
export function statusFilterValue(status: TestPlanInstanceStatus): string {
  return status.toLowerCase();
}
