import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_API_URL } from './client';
import { errorMessage, ValidationError } from './errors';
import { Output } from './output';
import { normalizeUuid, ProjectConfig, ProjectConfigSchema, UserConfig, UserConfigSchema } from './schemas';

export const PROJECT_CONFIG_FILE = '.otapush.json';
export const USER_CONFIG_FILE = '.otapushrc';

export const ENV_APP_ID = 'OTAPUSH_APP_ID';
export const ENV_API_TOKEN = 'OTAPUSH_API_TOKEN';
export const ENV_API_URL = 'OTAPUSH_API_URL';
export const ENV_DEPLOYMENT = 'OTAPUSH_DEPLOYMENT';

export interface ConfigLocations {
  /** Directory holding the project file, normally the working directory. */
  projectDir: string;
  /** Directory holding the user file, normally the home directory. */
  userDir: string;
}

export function defaultLocations(): ConfigLocations {
  return { projectDir: process.cwd(), userDir: os.homedir() };
}

function readJsonFile<T>(filePath: string, schema: z.ZodType<T>, output?: Output): T | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  try {
    const parsed = schema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    if (!parsed.success) {
      output?.warning(`ignoring ${filePath}: ${parsed.error.issues.map(i => i.message).join(', ')}`);
      return undefined;
    }
    return parsed.data;
  } catch (error) {
    output?.warning(`could not read ${filePath}: ${errorMessage(error)}`);
    return undefined;
  }
}

export function loadProjectConfig(locations: ConfigLocations, output?: Output): ProjectConfig | undefined {
  return readJsonFile(path.join(locations.projectDir, PROJECT_CONFIG_FILE), ProjectConfigSchema, output);
}

export function saveProjectConfig(locations: ConfigLocations, config: ProjectConfig): string {
  const filePath = path.join(locations.projectDir, PROJECT_CONFIG_FILE);
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return filePath;
}

export function loadUserConfig(locations: ConfigLocations, output?: Output): UserConfig | undefined {
  return readJsonFile(path.join(locations.userDir, USER_CONFIG_FILE), UserConfigSchema, output);
}

export function saveToken(locations: ConfigLocations, token: string): string {
  const filePath = path.join(locations.userDir, USER_CONFIG_FILE);
  const config: UserConfig = { ...loadUserConfig(locations), token };
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
  fs.chmodSync(filePath, 0o600);
  return filePath;
}

export function deleteToken(locations: ConfigLocations): boolean {
  const filePath = path.join(locations.userDir, USER_CONFIG_FILE);
  if (!fs.existsSync(filePath)) return false;
  fs.unlinkSync(filePath);
  return true;
}

export interface CredentialFlags {
  appId?: string;
  token?: string;
  apiUrl?: string;
}

export interface Credentials {
  appId: string;
  token: string;
  apiUrl: string;
}

/**
 * Resolve what every API command needs. Flags win over environment
 * variables, which win over the project and user files.
 */
export function resolveCredentials(
  flags: CredentialFlags,
  locations: ConfigLocations,
  output?: Output,
  env: NodeJS.ProcessEnv = process.env
): Credentials {
  const project = loadProjectConfig(locations, output);

  const appId = flags.appId || env[ENV_APP_ID] || project?.app_id || '';
  const token = flags.token || env[ENV_API_TOKEN] || loadUserConfig(locations, output)?.token || '';
  const apiUrl = flags.apiUrl || env[ENV_API_URL] || project?.api_url || DEFAULT_API_URL;

  return { appId, token, apiUrl };
}

export function requireCredentials(
  flags: CredentialFlags,
  locations: ConfigLocations,
  output?: Output,
  env: NodeJS.ProcessEnv = process.env
): Credentials {
  const credentials = resolveCredentials(flags, locations, output, env);
  if (!credentials.appId) {
    throw new ValidationError(`app ID is required: set --app-id, ${ENV_APP_ID}, or run 'otapush init'`);
  }
  if (!credentials.token) {
    throw new ValidationError(`API token is required: set --token, ${ENV_API_TOKEN}, or run 'otapush auth login'`);
  }
  return credentials;
}

export function validateAppId(appId: string): string {
  const id = normalizeUuid(appId);
  if (!id) {
    throw new ValidationError(`invalid app ID "${appId}": must be a valid UUID`);
  }
  return id;
}
