import { ResolutionError, wrapError } from './errors';
import { Output } from './output';
import { normalizeUuid } from './schemas';
import { Deployment, DeploymentLister, Package, PackageLister } from './types';

/**
 * Turn a deployment name or UUID into a deployment id. UUIDs are returned
 * in canonical form without a lookup; names are looked up with an exact, case-sensitive match.
 */
export async function resolveDeployment(
  client: DeploymentLister,
  appId: string,
  nameOrId: string,
  output: Output,
  signal?: AbortSignal
): Promise<string> {
  const id = normalizeUuid(nameOrId);
  if (id) {
    return id;
  }

  output.step(`Resolving deployment "${nameOrId}"`);

  let deployments: Deployment[];
  try {
    deployments = await client.listDeployments(appId, signal);
  } catch (error) {
    throw wrapError('listing deployments', error);
  }

  const match = deployments.find(d => d.name === nameOrId);
  if (!match) {
    throw new ResolutionError(
      `deployment "${nameOrId}" not found: check the deployment name or use a deployment UUID`
    );
  }

  output.info(`Resolved to ${match.id}`);
  return match.id;
}

async function listPackages(
  client: PackageLister,
  appId: string,
  deploymentId: string,
  signal?: AbortSignal
): Promise<Package[]> {
  try {
    return await client.listPackages(appId, deploymentId, signal);
  } catch (error) {
    throw wrapError('listing packages', error);
  }
}

export async function resolvePackageLabel(
  client: PackageLister,
  appId: string,
  deploymentId: string,
  label: string,
  output: Output,
  signal?: AbortSignal
): Promise<Package> {
  output.step(`Resolving release label "${label}"`);
  const packages = await listPackages(client, appId, deploymentId, signal);

  const match = packages.find(p => p.label === label);
  if (!match) {
    throw new ResolutionError(`release label "${label}" not found in deployment: check the label`);
  }

  output.info(`Resolved label "${label}" to package ID ${match.id}`);
  return match;
}

/**
 * Find the release a mutation should act on: the one carrying `label`, or
 * the latest one when no label is given. "Latest" is the last entry of the
 * listing, which the API returns oldest first.
 */
export async function resolvePackage(
  client: PackageLister,
  appId: string,
  deploymentId: string,
  label: string | undefined,
  output: Output,
  signal?: AbortSignal
): Promise<Package> {
  if (label) {
    return resolvePackageLabel(client, appId, deploymentId, label, output, signal);
  }

  output.step('Resolving latest release');
  const packages = await listPackages(client, appId, deploymentId, signal);

  const latest = packages.at(-1);
  if (!latest) {
    throw new ResolutionError('no releases found in deployment: push a release first');
  }

  output.info(`Resolved latest release: ${latest.label} (${latest.id})`);
  return latest;
}
