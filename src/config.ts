/**
 * Runtime configuration.
 *
 * Values come from environment variables and fall back to the production
 * endpoints and binaries. Everything is validated up front so a typo fails
 * the invocation before any track is touched.
 *
 * Environment:
 *   CHARMHUB_URL         Charmhub API root (default https://api.charmhub.io)
 *   SNAPSTORE_URL        Snap store API root (default https://api.snapcraft.io)
 *   GITHUB_API_URL       GitHub API root for upstream release tags
 *   GITHUB_TOKEN         optional bearer credential for the tags API
 *   CHARMCRAFT_BIN       charmcraft executable
 *   SNAPCRAFT_BIN        snapcraft executable
 *   SQA_BIN              QA lab CLI executable
 *   SQA_PRODUCT_UUID     product the bundle is registered under
 *   SQA_TEST_PLAN_ID     test plan instances are created against
 *   SQA_TEST_PLAN_NAME   key of the plan in instance listings
 *   HTTP_TIMEOUT_MS      per-request timeout for registry queries
 *   COMMAND_TIMEOUT_MS   per-command timeout for CLI collaborators
 *   LOG_LEVEL            debug|info|warn|error
 *   SNAP_NAME            snap promoted through the risk ladder
 *   BUNDLE_NAME          bundle name used in version keys
 *   BUNDLE_COMPONENTS    comma separated component charms
 */

import { z } from 'zod';
import { ConfigError, configInvalidError } from './domain/errors';
import { LogLevel } from './logger';

const csv = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0))
  .pipe(z.array(z.string()).min(1));

const positiveInt = z.coerce.number().int().positive();

const ConfigSchema = z.object({
  CHARMHUB_URL: z.string().url().default('https://api.charmhub.io'),
  SNAPSTORE_URL: z.string().url().default('https://api.snapcraft.io'),
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),
  GITHUB_TOKEN: z.string().min(1).optional(),
  CHARMCRAFT_BIN: z.string().min(1).default('/snap/bin/charmcraft'),
  SNAPCRAFT_BIN: z.string().min(1).default('/snap/bin/snapcraft'),
  SQA_BIN: z.string().min(1).default('/snap/bin/weebl-tools.sqalab'),
  SQA_PRODUCT_UUID: z.string().uuid().default('246d8ed3-b1dd-4875-a932-0cbc1b1c86b5'),
  SQA_TEST_PLAN_ID: z.string().uuid().default('394fb5b6-1698-4226-bd3e-23b471ee1bd4'),
  SQA_TEST_PLAN_NAME: z.string().min(1).default('CanonicalK8s'),
  HTTP_TIMEOUT_MS: positiveInt.default(10_000),
  COMMAND_TIMEOUT_MS: positiveInt.default(120_000),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.Info),
  SNAP_NAME: z.string().min(1).default('k8s'),
  BUNDLE_NAME: z.string().min(1).default('k8s-operator'),
  BUNDLE_COMPONENTS: csv.default('k8s,k8s-worker'),
});

export interface ReleaseConfig {
  charmhubUrl: string;
  snapstoreUrl: string;
  githubApiUrl: string;
  githubToken?: string;
  charmcraftBin: string;
  snapcraftBin: string;
  sqaBin: string;
  sqaProductUuid: string;
  sqaTestPlanId: string;
  sqaTestPlanName: string;
  httpTimeoutMs: number;
  commandTimeoutMs: number;
  logLevel: LogLevel;
  snapName: string;
  bundleName: string;
  bundleComponents: string[];
}

/** Load and validate configuration from an environment map. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReleaseConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      configInvalidError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)),
    );
  }

  const values = parsed.data;
  return {
    charmhubUrl: values.CHARMHUB_URL,
    snapstoreUrl: values.SNAPSTORE_URL,
    githubApiUrl: values.GITHUB_API_URL,
    githubToken: values.GITHUB_TOKEN,
    charmcraftBin: values.CHARMCRAFT_BIN,
    snapcraftBin: values.SNAPCRAFT_BIN,
    sqaBin: values.SQA_BIN,
    sqaProductUuid: values.SQA_PRODUCT_UUID,
    sqaTestPlanId: values.SQA_TEST_PLAN_ID,
    sqaTestPlanName: values.SQA_TEST_PLAN_NAME,
    httpTimeoutMs: values.HTTP_TIMEOUT_MS,
    commandTimeoutMs: values.COMMAND_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
    snapName: values.SNAP_NAME,
    bundleName: values.BUNDLE_NAME,
    bundleComponents: values.BUNDLE_COMPONENTS,
  };
}
