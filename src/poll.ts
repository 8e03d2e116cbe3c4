import { setTimeout as sleep } from 'timers/promises';
import { PollTimeoutError, ProcessingFailedError, ValidationError, wrapError } from './errors';
import { PackageRef, PackageStatus, PollConfig, STATUS_DONE, STATUS_FAILED, StatusChecker } from './types';

/**
 * Query the package status until it is `done` or `failed`, sleeping
 * `intervalMs` between queries, for at most `maxAttempts` queries.
 *
 * A failed query ends the poll at once; only non-terminal answers are
 * asked again. Aborting `signal` interrupts both the sleep and the query.
 */
export async function pollStatus(
  client: StatusChecker,
  ref: PackageRef,
  config: PollConfig,
  signal?: AbortSignal
): Promise<PackageStatus> {
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new ValidationError(`poll attempts must be at least 1, got ${config.maxAttempts}`);
  }

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    let status: PackageStatus;
    try {
      status = await client.getPackageStatus(ref.appId, ref.deploymentId, ref.packageId, signal);
    } catch (error) {
      throw wrapError('checking package status', error);
    }

    switch (status.status) {
      case STATUS_DONE:
        return status;
      case STATUS_FAILED:
        throw new ProcessingFailedError(status.statusReason);
    }

    if (attempt < config.maxAttempts - 1) {
      await sleep(config.intervalMs, undefined, { signal });
    }
  }

  throw new PollTimeoutError(config.maxAttempts * config.intervalMs);
}
