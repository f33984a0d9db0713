/**
 * QA lab test-service client.
 *
 * Wraps the lab CLI (`--format json`). The service groups test plan
 * instances under "product versions" keyed by (channel, version); the
 * version key is the bundle's composite version, so every operation here
 * can be re-run without creating duplicates.
 */

import { z } from 'zod';
import {
  ambiguousRecordsError,
  createTypedError,
  InvariantError,
  malformedResponseError,
  TestServiceError,
  TypedError,
} from '../domain/errors';
import { parseTestStatus, statusFilterValue, TestPlanInstanceStatus } from '../domain/test-status';
import { logger } from '../logger';
import { AddonVariables, materializeAddon } from './addon';
import { CommandRunner } from './command';

export interface ProductVersion {
  uuid: string;
  version: string;
  channel: string;
  productName: string;
  productUuid: string;
}

export interface TestPlanInstance {
  uuid: string;
  id: string;
  testPlan: string;
  status: TestPlanInstanceStatus;
  productUnderTest: string;
  effectivePriority: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface Addon {
  uuid: string;
  id: string;
  name: string;
}

/** Ad-hoc build status used by the insight-build path. */
export interface Build {
  uuid: string;
  status: string;
  result: string | null;
}

export interface StartTestRequest {
  channel: string;
  base: string;
  arch: string;
  /** Composite bundle version used as the correlation key. */
  version: string;
  priority: number;
  variables: AddonVariables;
}

/** Test-service operations the reconciler and the build seeder depend on. */
export interface TestService {
  listProductVersions(channel: string, version: string): Promise<ProductVersion[]>;
  /** UUIDs of instances with `status` under one product version. */
  listTestPlanInstances(productVersionUuid: string, status: TestPlanInstanceStatus): Promise<string[]>;
  /** Ensure product version and addon exist, then submit one test plan instance. */
  startTest(request: StartTestRequest): Promise<void>;
  getBuild(jobId: string): Promise<Build | null>;
  createBuild(name: string, variables: AddonVariables): Promise<Build>;
}

const dateString = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date ${value}` });
    return z.NEVER;
  }
  return date;
});

const ProductVersionSchema = z
  .object({
    uuid: z.string().uuid(),
    version: z.string(),
    channel: z.string(),
    'product.name': z.string(),
    'product.uuid': z.string(),
  })
  .transform((value) => ({
    uuid: value.uuid,
    version: value.version,
    channel: value.channel,
    productName: value['product.name'],
    productUuid: value['product.uuid'],
  }));

const TestPlanInstanceSchema = z
  .object({
    uuid: z.string().uuid(),
    id: z.union([z.string(), z.number()]).transform(String),
    test_plan: z.string(),
    status: z.string(),
    product_under_test: z.string(),
    effective_priority: z.coerce.number(),
    created_at: dateString,
    updated_at: dateString,
  })
  .transform((value) => ({
    uuid: value.uuid,
    id: value.id,
    testPlan: value.test_plan,
    status: parseTestStatus(value.status),
    productUnderTest: value.product_under_test,
    effectivePriority: value.effective_priority,
    createdAt: value.created_at,
    updatedAt: value.updated_at,
  }));

const AddonSchema = z.object({
  uuid: z.string().uuid(),
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
});

const BuildSchema = z.object({
  uuid: z.string(),
  status: z.string(),
  result: z.string().nullish().transform((value) => value ?? null),
});

const InstanceListingSchema = z.record(z.array(z.string()));

// A line opening a JSON array, as opposed to a `[INFO] ...` progress line.
const ARRAY_LINE = /^[ \t]*\[[ \t]*(?:$|[[{\]"\d-])/m;

function arrayStart(output: string): number {
  const match = ARRAY_LINE.exec(output);
  return match ? output.indexOf('[', match.index) : output.indexOf('[');
}

/** Addons are rendered per channel, so their names carry it. */
export function addonName(version: string, channel: string): string {
  return `${version}-${channel.replace(/\//g, '-')}`;
}

/**
 * Slice the JSON document out of CLI output that may carry progress lines
 * before or after it.
 */
export function extractJson(output: string, open: '[' | '{'): string {
  const trimmed = output.trim();
  if (trimmed.length === 0) return open === '[' ? '[]' : '{}';
  const close = open === '[' ? ']' : '}';
  const start = open === '{' ? trimmed.lastIndexOf(open) : arrayStart(trimmed);
  const end = trimmed.lastIndexOf(close);
  if (start === -1 || end === -1 || end < start) return trimmed;
  return trimmed.slice(start, end + 1);
}

function parseOutput<T>(source: string, output: string, open: '[' | '{', schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJson(output, open));
  } catch (err) {
    throw new InvariantError(malformedResponseError(source, [err instanceof Error ? err.message : 'not JSON']));
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvariantError(
      malformedResponseError(source, parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)),
    );
  }
  return parsed.data;
}

/** Exactly one record from a create command, or an invariant error. */
function single<T>(kind: string, records: T[]): T {
  if (records.length === 0) {
    throw new InvariantError(
      createTypedError({ code: 'INVARIANT.EMPTY_RESPONSE', message: `No ${kind} returned from create command` }),
    );
  }
  if (records.length > 1) throw new InvariantError(ambiguousRecordsError(kind, records.length));
  return records[0];
}

export interface SqaTestServiceOptions {
  commands: CommandRunner;
  bin: string;
  productUuid: string;
  testPlanId: string;
  testPlanName: string;
}

const log = logger.child({ module: 'sqa' });

export class SqaTestService implements TestService {
  constructor(private readonly options: SqaTestServiceOptions) {}

  private async run(args: string[]): Promise<string> {
    const { stdout } = await this.options.commands.run(this.options.bin, args);
    return stdout;
  }

  async listProductVersions(channel: string, version: string): Promise<ProductVersion[]> {
    log.info('Listing product versions', { channel, version });
    const output = await this.run(['productversion', 'list', '--channel', channel, '--version', version, '--format', 'json']);
    return parseOutput('productversion list', output, '[', z.array(ProductVersionSchema));
  }

  async listTestPlanInstances(productVersionUuid: string, status: TestPlanInstanceStatus): Promise<string[]> {
    log.debug('Listing test plan instances', { productVersion: productVersionUuid, status });
    const output = await this.run([
      'testplaninstance',
      'list',
      '--format',
      'json',
      '--productversion-uuid',
      productVersionUuid,
      '--status',
      statusFilterValue(status),
    ]);
    const listing = parseOutput('testplaninstance list', output, '{', InstanceListingSchema);
    return listing[this.options.testPlanName] ?? [];
  }

  async createProductVersion(channel: string, base: string, version: string): Promise<ProductVersion> {
    log.info('Creating product version', { channel, base, version });
    const output = await this.run([
      'productversion',
      'add',
      '--format',
      'json',
      '--product-uuid',
      this.options.productUuid,
      '--channel',
      channel,
      '--version',
      version,
      '--series',
      base,
    ]);
    return single('product version', parseOutput('productversion add', output, '[', z.array(ProductVersionSchema)));
  }

  /** Reuse the addon named `name` if the service already has one, else create it. */
  async ensureAddon(name: string, variables: AddonVariables): Promise<Addon> {
    const existing = parseOutput(
      'addon list',
      await this.run(['addon', 'list', '--format', 'json', '--name', name]),
      '[',
      z.array(AddonSchema),
    );
    if (existing.length > 1) throw new InvariantError(ambiguousRecordsError('addon', existing.length, { name }));
    if (existing.length === 1) {
      log.info('Reusing addon', { name, addon: existing[0].uuid });
      return existing[0];
    }

    const addon = await materializeAddon(variables);
    try {
      log.info('Creating addon', { name, dir: addon.dir });
      const output = await this.run(['addon', 'add', '--format', 'json', '--addon', addon.dir, '--name', name]);
      return single('addon', parseOutput('addon add', output, '[', z.array(AddonSchema)));
    } finally {
      await addon.cleanup();
    }
  }

  async createTestPlanInstance(productVersionUuid: string, addonUuid: string, priority: number): Promise<TestPlanInstance> {
    log.info('Creating test plan instance', { productVersion: productVersionUuid, addon: addonUuid, priority });
    const output = await this.run([
      'testplaninstance',
      'add',
      '--format',
      'json',
      '--test_plan',
      this.options.testPlanId,
      '--addon_id',
      addonUuid,
      '--status',
      TestPlanInstanceStatus.InProgress,
      '--base_priority',
      String(priority),
      '--product_under_test',
      productVersionUuid,
    ]);
    return single('test plan instance', parseOutput('testplaninstance add', output, '[', z.array(TestPlanInstanceSchema)));
  }

  async startTest(request: StartTestRequest): Promise<void> {
    const existing = await this.listProductVersions(request.channel, request.version);
    if (existing.length > 1) {
      throw new InvariantError(
        ambiguousRecordsError('product version', existing.length, {
          channel: request.channel,
          base: request.base,
          arch: request.arch,
          version: request.version,
        }),
      );
    }

    const productVersion =
      existing[0] ?? (await this.createProductVersion(request.channel, request.base, request.version));
    if (existing[0]) {
      log.info('Reusing product version', { productVersion: productVersion.uuid, version: request.version });
    }

    const addon = await this.ensureAddon(addonName(request.version, request.channel), request.variables);
    const instance = await this.createTestPlanInstance(productVersion.uuid, addon.uuid, request.priority);
    log.info('Started release test', { channel: request.channel, version: request.version, testPlanInstance: instance.uuid });
  }

  async getBuild(jobId: string): Promise<Build | null> {
    const builds = parseOutput(
      'build list',
      await this.run(['build', 'list', '--format', 'json', '--uuid', jobId]),
      '[',
      z.array(BuildSchema),
    );
    if (builds.length > 1) throw new InvariantError(ambiguousRecordsError('build', builds.length, { jobId }));
    return builds[0] ?? null;
  }

  async createBuild(name: string, variables: AddonVariables): Promise<Build> {
    const addon = await this.ensureAddon(addonName(name, variables.channel), variables);
    log.info('Creating build', { name, addon: addon.uuid });
    const output = await this.run([
      'build',
      'add',
      '--format',
      'json',
      '--test_plan',
      this.options.testPlanId,
      '--addon_id',
      addon.uuid,
    ]);
    return single('build', parseOutput('build add', output, '[', z.array(BuildSchema)));
  }
}

/** Wrap typed command failures as test-service errors. */
export function toTestServiceError(failure: TypedError): Error {
  return new TestServiceError(failure);
}
