import { ValidationError } from './errors';
import { BaseOptions } from './types';

/** Checks shared by every workflow that talks to the API. */
export function validateBaseOptions(options: BaseOptions): void {
  if (!options.appId) {
    throw new ValidationError('app ID is required: set --app-id or OTAPUSH_APP_ID');
  }
  if (!options.token) {
    throw new ValidationError("API token is required: set --token, OTAPUSH_API_TOKEN, or run 'otapush auth login'");
  }
}

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export function parseBoolean(name: string, value: string): boolean {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new ValidationError(`${name} must be true or false, got "${value}"`);
}

export function parseRollout(value: string): number {
  const rollout = /^[+-]?\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(rollout) || rollout < 1 || rollout > 100) {
    throw new ValidationError(`rollout must be between 1 and 100, got "${value}"`);
  }
  return rollout;
}
