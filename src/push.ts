import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { archiveDirectory } from './archive';
import { ValidationError, wrapError } from './errors';
import { Output } from './output';
import { pollStatus } from './poll';
import { resolveDeployment } from './resolve';
import { validateBaseOptions } from './validate';
import {
  DEFAULT_POLL_CONFIG,
  PollConfig,
  PushClient,
  PushOptions,
  PushResult,
  UploadSlot,
  UploadUrlRequest,
} from './types';

export const DEFAULT_ROLLOUT = 100;

export async function validatePushOptions(options: PushOptions): Promise<void> {
  validateBaseOptions(options);

  if (!options.deployment) {
    throw new ValidationError('deployment is required: set --deployment or OTAPUSH_DEPLOYMENT');
  }
  if (!options.appVersion) {
    throw new ValidationError('app version is required: set --app-version');
  }
  if (!options.bundlePath) {
    throw new ValidationError('bundle path is required: provide it as the first argument');
  }
  if (!Number.isInteger(options.rollout) || options.rollout < 1 || options.rollout > 100) {
    throw new ValidationError(`rollout must be between 1 and 100, got ${options.rollout}`);
  }

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(options.bundlePath);
  } catch (error) {
    throw new ValidationError(`bundle path does not exist: ${options.bundlePath}`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new ValidationError(`bundle path is not a directory: ${options.bundlePath}`);
  }
}

/**
 * Metadata sent with the upload slot request. Defaults are left out:
 * a 100% rollout, false flags and an empty description.
 */
export function buildUploadUrlRequest(
  options: PushOptions,
  fileName: string,
  fileSizeBytes: number
): UploadUrlRequest {
  const request: UploadUrlRequest = {
    appVersion: options.appVersion,
    fileName,
    fileSizeBytes,
  };
  if (options.description) {
    request.description = options.description;
  }
  if (options.mandatory) {
    request.mandatory = true;
  }
  if (options.disabled) {
    request.disabled = true;
  }
  if (options.rollout !== DEFAULT_ROLLOUT) {
    request.rollout = options.rollout;
  }
  return request;
}

interface UploadedBundle {
  packageId: string;
  fileSizeBytes: number;
}

async function uploadBundle(
  client: PushClient,
  options: PushOptions,
  deploymentId: string,
  output: Output
): Promise<UploadedBundle> {
  output.step(`Packaging bundle: ${options.bundlePath}`);
  let zipPath: string;
  try {
    zipPath = await archiveDirectory(options.bundlePath);
  } catch (error) {
    throw wrapError('packaging bundle', error);
  }

  try {
    let fileSizeBytes: number;
    try {
      fileSizeBytes = (await fs.promises.stat(zipPath)).size;
    } catch (error) {
      throw wrapError('reading archive info', error);
    }
    output.info(`Package size: ${fileSizeBytes} bytes`);

    const packageId = randomUUID();

    output.step('Requesting upload URL');
    let slot: UploadSlot;
    try {
      slot = await client.getUploadUrl(
        options.appId,
        deploymentId,
        packageId,
        buildUploadUrlRequest(options, path.basename(zipPath), fileSizeBytes),
        options.signal
      );
    } catch (error) {
      throw wrapError('requesting upload URL', error);
    }

    output.step('Uploading package');
    const body = fs.createReadStream(zipPath);
    try {
      await client.uploadFile({
        url: slot.url,
        method: slot.method,
        headers: slot.headers,
        body,
        contentLength: fileSizeBytes,
        signal: options.signal,
      });
    } catch (error) {
      throw wrapError('uploading package', error);
    } finally {
      body.destroy();
    }

    return { packageId, fileSizeBytes };
  } finally {
    await fs.promises.rm(zipPath, { force: true });
  }
}

/**
 * Publish a bundle directory as a new release: archive it, upload it to a
 * signed slot and wait for the server to finish processing it.
 */
export async function push(
  client: PushClient,
  options: PushOptions,
  output: Output,
  pollConfig: PollConfig = DEFAULT_POLL_CONFIG
): Promise<PushResult> {
  await validatePushOptions(options);

  const deploymentId = await resolveDeployment(client, options.appId, options.deployment, output, options.signal);

  const { packageId, fileSizeBytes } = await uploadBundle(client, options, deploymentId, output);

  output.step('Processing package');
  const status = await pollStatus(
    client,
    { appId: options.appId, deploymentId, packageId },
    pollConfig,
    options.signal
  );

  return {
    packageId,
    appId: options.appId,
    deploymentId,
    appVersion: options.appVersion,
    status: status.status,
    fileSizeBytes,
  };
}
