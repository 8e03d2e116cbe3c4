import { ValidationError, wrapError } from './errors';
import { Output } from './output';
import { resolveDeployment, resolvePackage } from './resolve';
import { Package, PatchClient, PatchOptions, PatchRequest, PatchResult } from './types';
import { parseBoolean, parseRollout, validateBaseOptions } from './validate';

export function validatePatchOptions(options: PatchOptions): void {
  validateBaseOptions(options);

  if (!options.deployment) {
    throw new ValidationError('deployment is required: set --deployment or OTAPUSH_DEPLOYMENT');
  }
  if (!options.rollout && !options.mandatory && !options.disabled && !options.description && !options.appVersion) {
    throw new ValidationError(
      'at least one change is required: set --rollout, --mandatory, --disabled, --description, or --app-version'
    );
  }
}

/**
 * Build the partial update. Only the fields the caller supplied are set;
 * everything else stays undefined and is left off the request body.
 */
export function buildPatchRequest(options: PatchOptions): PatchRequest {
  const request: PatchRequest = {};

  if (options.rollout) {
    request.rollout = parseRollout(options.rollout);
  }
  if (options.mandatory) {
    request.mandatory = parseBoolean('mandatory', options.mandatory);
  }
  if (options.disabled) {
    request.disabled = parseBoolean('disabled', options.disabled);
  }
  if (options.description) {
    request.description = options.description;
  }
  if (options.appVersion) {
    request.appVersion = options.appVersion;
  }

  return request;
}

/** Update the mutable fields of a release, by label or the latest one. */
export async function patch(client: PatchClient, options: PatchOptions, output: Output): Promise<PatchResult> {
  validatePatchOptions(options);
  const request = buildPatchRequest(options);

  const deploymentId = await resolveDeployment(client, options.appId, options.deployment, output, options.signal);
  const target = await resolvePackage(client, options.appId, deploymentId, options.label, output, options.signal);

  output.step(`Patching release ${target.label}`);
  let pkg: Package;
  try {
    pkg = await client.patchPackage(options.appId, deploymentId, target.id, request, options.signal);
  } catch (error) {
    throw wrapError('patch failed', error);
  }

  return {
    packageId: pkg.id,
    appId: options.appId,
    deploymentId,
    label: pkg.label,
    appVersion: pkg.appVersion,
    mandatory: pkg.mandatory,
    disabled: pkg.disabled,
    rollout: pkg.rollout,
    description: pkg.description,
  };
}
