import { ValidationError, wrapError } from './errors';
import { Output } from './output';
import { resolveDeployment, resolvePackageLabel } from './resolve';
import { Package, PromoteClient, PromoteOptions, PromoteRequest, PromoteResult } from './types';
import { validateBaseOptions } from './validate';

export function validatePromoteOptions(options: PromoteOptions): void {
  validateBaseOptions(options);

  if (!options.sourceDeployment) {
    throw new ValidationError('source deployment is required: set --source-deployment');
  }
  if (!options.destDeployment) {
    throw new ValidationError('destination deployment is required: set --destination-deployment');
  }
  // compared as given; two spellings of the same deployment are not caught here
  if (options.sourceDeployment === options.destDeployment) {
    throw new ValidationError('source and destination deployments must be different');
  }
}

/**
 * Copy a release from one deployment to another. Overrides travel as the
 * strings the user typed and are dropped when empty, so the server falls
 * back to the source release's values.
 */
export async function promote(client: PromoteClient, options: PromoteOptions, output: Output): Promise<PromoteResult> {
  validatePromoteOptions(options);

  let sourceDeploymentId: string;
  try {
    sourceDeploymentId = await resolveDeployment(
      client,
      options.appId,
      options.sourceDeployment,
      output,
      options.signal
    );
  } catch (error) {
    throw wrapError('resolving source deployment', error);
  }

  let destDeploymentId: string;
  try {
    destDeploymentId = await resolveDeployment(client, options.appId, options.destDeployment, output, options.signal);
  } catch (error) {
    throw wrapError('resolving destination deployment', error);
  }

  const request: PromoteRequest = { targetDeploymentId: destDeploymentId };
  if (options.appVersion) request.appVersion = options.appVersion;
  if (options.description) request.description = options.description;
  if (options.mandatory) request.mandatory = options.mandatory;
  if (options.disabled) request.disabled = options.disabled;
  if (options.rollout) request.rollout = options.rollout;

  if (options.label) {
    const source = await resolvePackageLabel(
      client,
      options.appId,
      sourceDeploymentId,
      options.label,
      output,
      options.signal
    );
    request.packageId = source.id;
  }

  output.step(`Promoting from ${options.sourceDeployment} to ${options.destDeployment}`);
  let pkg: Package;
  try {
    pkg = await client.promote(options.appId, sourceDeploymentId, request, options.signal);
  } catch (error) {
    throw wrapError('promote failed', error);
  }

  return {
    packageId: pkg.id,
    appId: options.appId,
    sourceDeploymentId,
    destDeploymentId,
    label: pkg.label,
    appVersion: pkg.appVersion,
    description: pkg.description,
  };
}
