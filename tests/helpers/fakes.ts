/**
 * In-process stand-ins for the registry, test service and snap store.
 */

import { AddonVariables } from '../../src/clients/addon';
import { PackageRegistry } from '../../src/clients/charmhub';
import { ChannelMapEntry, SnapStore } from '../../src/clients/snapstore';
import { Build, ProductVersion, StartTestRequest, TestService } from '../../src/clients/sqa';
import { createTypedError, PromotionError, QueryError } from '../../src/domain/errors';
import { MatrixCell, RevisionMatrix } from '../../src/domain/revision-matrix';
import { TestPlanInstanceStatus } from '../../src/domain/test-status';
import { LogEntry, resetLogHandler, setLogHandler } from '../../src/logger';

/** Route log entries into an array for the duration of a test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  beforeEach(() => {
    entries.length = 0;
    setLogHandler((entry) => entries.push(entry));
  });
  afterEach(() => resetLogHandler());
  return entries;
}

export class FakeRegistry implements PackageRegistry {
  readonly matrices = new Map<string, RevisionMatrix>();
  readonly promotions: Array<[string, string, string]> = [];
  readonly queries: Array<[string, string]> = [];
  failQueries = false;
  failPromotion = false;

  publish(component: string, channel: string, cells: MatrixCell[]): void {
    this.matrices.set(`${component}|${channel}`, RevisionMatrix.from(cells));
  }

  async getRevisionMatrix(component: string, channel: string): Promise<RevisionMatrix> {
    this.queries.push([component, channel]);
    if (this.failQueries) {
      throw new QueryError(createTypedError({ code: 'REGISTRY.HTTP.TRANSIENT', message: 'registry unavailable' }));
    }
    return RevisionMatrix.from(this.matrices.get(`${component}|${channel}`)?.cells() ?? []);
  }

  async promote(component: string, fromChannel: string, toChannel: string): Promise<void> {
    if (this.failPromotion) {
      throw new PromotionError(createTypedError({ code: 'PROMOTION.COMMAND_FAILED', message: 'charmcraft refused' }));
    }
    this.promotions.push([component, fromChannel, toChannel]);
    this.publish(component, toChannel, this.matrices.get(`${component}|${fromChannel}`)?.cells() ?? []);
  }
}

export class FakeTestService implements TestService {
  readonly productVersions = new Map<string, ProductVersion[]>();
  /** Product version uuid → status → instance uuids. */
  readonly instances = new Map<string, Map<TestPlanInstanceStatus, string[]>>();
  readonly started: StartTestRequest[] = [];
  readonly builds = new Map<string, Build>();
  readonly createdBuilds: Array<{ name: string; variables: AddonVariables }> = [];
  readonly listCalls: Array<[string, TestPlanInstanceStatus]> = [];
  /** When set, startTest registers an in-progress instance like the real service. */
  recordStarted = true;
  private sequence = 0;

  addInstance(channel: string, version: string, status: TestPlanInstanceStatus): string {
    const key = `${channel}|${version}`;
    let versions = this.productVersions.get(key);
    if (!versions) {
      versions = [
        {
          uuid: `pv-${++this.sequence}`,
          version,
          channel,
          productName: 'k8s-operator',
          productUuid: 'product-1',
        },
      ];
      this.productVersions.set(key, versions);
    }
    const pv = versions[0].uuid;
    const byStatus = this.instances.get(pv) ?? new Map<TestPlanInstanceStatus, string[]>();
    const id = `tpi-${++this.sequence}`;
    byStatus.set(status, [...(byStatus.get(status) ?? []), id]);
    this.instances.set(pv, byStatus);
    return id;
  }

  async listProductVersions(channel: string, version: string): Promise<ProductVersion[]> {
    return this.productVersions.get(`${channel}|${version}`) ?? [];
  }

  async listTestPlanInstances(productVersionUuid: string, status: TestPlanInstanceStatus): Promise<string[]> {
    this.listCalls.push([productVersionUuid, status]);
    return this.instances.get(productVersionUuid)?.get(status) ?? [];
  }

  async startTest(request: StartTestRequest): Promise<void> {
    this.started.push(request);
    if (this.recordStarted) {
      this.addInstance(request.channel, request.version, TestPlanInstanceStatus.InProgress);
    }
  }

  async getBuild(jobId: string): Promise<Build | null> {
    return this.builds.get(jobId) ?? null;
  }

  async createBuild(name: string, variables: AddonVariables): Promise<Build> {
    this.createdBuilds.push({ name, variables });
    const build: Build = { uuid: `build-${this.createdBuilds.length}`, status: 'queued', result: null };
    this.builds.set(build.uuid, build);
    return build;
  }
}

export class FakeSnapStore implements SnapStore {
  readonly released: Array<[string, number, string]> = [];
  /** Channels whose releases are refused. */
  readonly refuse = new Set<string>();

  constructor(public entries: ChannelMapEntry[] = []) {}

  async channelMap(): Promise<ChannelMapEntry[]> {
    return this.entries;
  }

  async releaseRevision(snap: string, revision: number, channel: string): Promise<void> {
    if (this.refuse.has(channel)) {
      throw new PromotionError(createTypedError({ code: 'PROMOTION.COMMAND_FAILED', message: 'snapcraft refused' }));
    }
    this.released.push([snap, revision, channel]);
  }
}
