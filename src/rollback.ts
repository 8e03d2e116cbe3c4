import { ValidationError, wrapError } from './errors';
import { Output } from './output';
import { resolveDeployment, resolvePackageLabel } from './resolve';
import { Package, RollbackClient, RollbackOptions, RollbackRequest, RollbackResult } from './types';
import { validateBaseOptions } from './validate';

/**
 * Roll a deployment back. Without a target label the server picks the
 * release before the current one.
 */
export async function rollback(
  client: RollbackClient,
  options: RollbackOptions,
  output: Output
): Promise<RollbackResult> {
  validateBaseOptions(options);
  if (!options.deployment) {
    throw new ValidationError('deployment is required: set --deployment or OTAPUSH_DEPLOYMENT');
  }

  const deploymentId = await resolveDeployment(client, options.appId, options.deployment, output, options.signal);

  const request: RollbackRequest = {};
  if (options.targetLabel) {
    const target = await resolvePackageLabel(
      client,
      options.appId,
      deploymentId,
      options.targetLabel,
      output,
      options.signal
    );
    request.packageId = target.id;
  }

  output.step('Rolling back deployment');
  let pkg: Package;
  try {
    pkg = await client.rollback(options.appId, deploymentId, request, options.signal);
  } catch (error) {
    throw wrapError('rollback failed', error);
  }

  return {
    packageId: pkg.id,
    appId: options.appId,
    deploymentId,
    label: pkg.label,
    appVersion: pkg.appVersion,
  };
}
