/**
 * Test-job ("addon") configuration.
 *
 * The variables a test job is parameterised with are an explicit struct.
 * The component → application name mapping is a named policy chosen by
 * track, and is resolved here before the configuration is written.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { stringify } from 'yaml';
import { AppNamePolicy, applyAppNamePolicy } from '../domain/channel';
import { Revision } from '../domain/revision-matrix';

export interface AddonVariables {
  base: string;
  arch: string;
  channel: string;
  /** Source branch the test suite is checked out from. */
  branch?: string;
  /** Component → revision under test. */
  revisions: Record<string, Revision>;
  appNamePolicy: AppNamePolicy;
}

/** Template keys for component revisions, e.g. `k8s_worker_revision`. */
export function revisionVariables(revisions: Record<string, Revision>): Record<string, Revision> {
  const variables: Record<string, Revision> = {};
  for (const [component, revision] of Object.entries(revisions)) {
    variables[`${component.replace(/-/g, '_')}_revision`] = revision;
  }
  return variables;
}

/** Flat configuration document written into the addon. */
export function addonDocument(variables: AddonVariables): Record<string, unknown> {
  const applications: Record<string, string> = {};
  for (const component of Object.keys(variables.revisions).sort()) {
    applications[component] = applyAppNamePolicy(variables.appNamePolicy, component);
  }

  return {
    base: variables.base,
    arch: variables.arch,
    channel: variables.channel,
    ...(variables.branch ? { branch: variables.branch } : {}),
    ...revisionVariables(variables.revisions),
    applications,
  };
}

export function renderAddonConfig(variables: AddonVariables): string {
  return stringify(addonDocument(variables));
}

/** An addon directory on disk, laid out as `<root>/addon/config/variables.yaml`. */
export interface MaterializedAddon {
  dir: string;
  cleanup(): Promise<void>;
}

export async function materializeAddon(variables: AddonVariables): Promise<MaterializedAddon> {
  const root = await mkdtemp(join(tmpdir(), 'release-addon-'));
  // The test service requires the directory to be named `addon`.
  const dir = join(root, 'addon');
  await mkdir(join(dir, 'config'), { recursive: true });
  await writeFile(join(dir, 'config', 'variables.yaml'), renderAddonConfig(variables), 'utf-8');

  return {
    dir,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
