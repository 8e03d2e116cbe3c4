import * as path from 'path';
import { parseArgs } from 'util';
import { exportResult } from './ci';
import {
  ConfigLocations,
  Credentials,
  deleteToken,
  ENV_API_TOKEN,
  ENV_DEPLOYMENT,
  loadProjectConfig,
  PROJECT_CONFIG_FILE,
  requireCredentials,
  saveProjectConfig,
  saveToken,
  validateAppId,
} from './config';
import { ValidationError, wrapError } from './errors';
import { formatBytes, formatJson, formatKeyValues, formatRollout, formatTable, KeyValue } from './format';
import { Output } from './output';
import { patch } from './patch';
import { promote } from './promote';
import { DEFAULT_ROLLOUT, push } from './push';
import { resolveDeployment, resolvePackage, resolvePackageLabel } from './resolve';
import { rollback } from './rollback';
import { normalizeUuid } from './schemas';
import { Client, Deployment, Package, PackageStatus, PollConfig } from './types';
import { parseRollout } from './validate';

export interface CommandContext {
  output: Output;
  /** Writes a line of command output to stdout. */
  print(text: string): void;
  locations: ConfigLocations;
  env: NodeJS.ProcessEnv;
  createClient(credentials: Credentials): Client;
  pollConfig?: PollConfig;
  signal?: AbortSignal;
}

export const GLOBAL_OPTIONS = {
  'app-id': { type: 'string' },
  'token': { type: 'string' },
  'api-url': { type: 'string' },
  'json': { type: 'boolean' },
} as const;

interface GlobalValues {
  'app-id'?: string;
  'token'?: string;
  'api-url'?: string;
  'json'?: boolean;
}

interface Connection {
  client: Client;
  appId: string;
  token: string;
}

function connect(values: GlobalValues, ctx: CommandContext): Connection {
  const credentials = requireCredentials(
    { appId: values['app-id'], token: values.token, apiUrl: values['api-url'] },
    ctx.locations,
    ctx.output,
    ctx.env
  );
  return { client: ctx.createClient(credentials), appId: credentials.appId, token: credentials.token };
}

function deploymentFlag(value: string | undefined, ctx: CommandContext): string {
  return value || ctx.env[ENV_DEPLOYMENT] || '';
}

function packageRows(packages: Package[]): string[][] {
  return packages.map(p => [
    p.label,
    p.appVersion,
    formatRollout(p.rollout),
    String(p.mandatory),
    String(p.disabled),
    formatBytes(p.fileSizeBytes),
    p.createdAt ?? '',
  ]);
}

const PACKAGE_HEADERS = ['LABEL', 'APP VERSION', 'ROLLOUT', 'MANDATORY', 'DISABLED', 'SIZE', 'CREATED'];

function packagePairs(pkg: Package): KeyValue[] {
  const pairs: KeyValue[] = [
    { key: 'Package ID', value: pkg.id },
    { key: 'Label', value: pkg.label },
    { key: 'App version', value: pkg.appVersion },
    { key: 'Rollout', value: formatRollout(pkg.rollout) },
    { key: 'Mandatory', value: String(pkg.mandatory) },
    { key: 'Disabled', value: String(pkg.disabled) },
    { key: 'Size', value: formatBytes(pkg.fileSizeBytes) },
  ];
  if (pkg.description) pairs.push({ key: 'Description', value: pkg.description });
  if (pkg.hash) pairs.push({ key: 'Hash', value: pkg.hash });
  if (pkg.createdAt) pairs.push({ key: 'Created', value: pkg.createdAt });
  if (pkg.createdBy) pairs.push({ key: 'Created by', value: pkg.createdBy.email || pkg.createdBy.username });
  return pairs;
}

// Release management

const PUSH_OPTIONS = {
  ...GLOBAL_OPTIONS,
  'deployment': { type: 'string', short: 'd' },
  'app-version': { type: 'string' },
  'description': { type: 'string' },
  'mandatory': { type: 'boolean' },
  'disabled': { type: 'boolean' },
  'rollout': { type: 'string' },
} as const;

export async function runPush(args: string[], ctx: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({ args, options: PUSH_OPTIONS, allowPositionals: true });
  const { client, appId, token } = connect(values, ctx);

  const bundleArg = positionals[0];
  const result = await push(
    client,
    {
      appId,
      token,
      deployment: deploymentFlag(values.deployment, ctx),
      appVersion: values['app-version'] ?? '',
      description: values.description,
      mandatory: values.mandatory,
      disabled: values.disabled,
      rollout: values.rollout === undefined ? DEFAULT_ROLLOUT : parseRollout(values.rollout),
      bundlePath: bundleArg ? path.resolve(bundleArg) : '',
      signal: ctx.signal,
    },
    ctx.output,
    ctx.pollConfig
  );

  if (values.json) {
    ctx.print(formatJson(result));
  } else {
    ctx.output.success('Push successful');
    ctx.print(
      formatKeyValues([
        { key: 'Package ID', value: result.packageId },
        { key: 'App version', value: result.appVersion },
        { key: 'Status', value: result.status },
        { key: 'Size', value: formatBytes(result.fileSizeBytes) },
      ])
    );
  }

  await exportResult('push', result, ctx.output, {
    OTAPUSH_PACKAGE_ID: result.packageId,
    OTAPUSH_APP_VERSION: result.appVersion,
  });
}

const PATCH_OPTIONS = {
  ...GLOBAL_OPTIONS,
  'deployment': { type: 'string', short: 'd' },
  'label': { type: 'string' },
  'rollout': { type: 'string' },
  'mandatory': { type: 'string' },
  'disabled': { type: 'string' },
  'description': { type: 'string' },
  'app-version': { type: 'string' },
} as const;

export async function runPatch(args: string[], ctx: CommandContext): Promise<void> {
  const { values } = parseArgs({ args, options: PATCH_OPTIONS });
  const { client, appId, token } = connect(values, ctx);

  const result = await patch(
    client,
    {
      appId,
      token,
      deployment: deploymentFlag(values.deployment, ctx),
      label: values.label,
      rollout: values.rollout,
      mandatory: values.mandatory,
      disabled: values.disabled,
      description: values.description,
      appVersion: values['app-version'],
      signal: ctx.signal,
    },
    ctx.output
  );

  if (values.json) {
    ctx.print(formatJson(result));
  } else {
    ctx.output.success(`Patched release ${result.label}`);
    ctx.print(
      formatKeyValues([
        { key: 'Package ID', value: result.packageId },
        { key: 'Label', value: result.label },
        { key: 'App version', value: result.appVersion },
        { key: 'Rollout', value: formatRollout(result.rollout) },
        { key: 'Mandatory', value: String(result.mandatory) },
        { key: 'Disabled', value: String(result.disabled) },
      ])
    );
  }

  await exportResult('patch', result, ctx.output, {
    OTAPUSH_PACKAGE_ID: result.packageId,
    OTAPUSH_APP_VERSION: result.appVersion,
    OTAPUSH_LABEL: result.label,
  });
}

const ROLLBACK_OPTIONS = {
  ...GLOBAL_OPTIONS,
  'deployment': { type: 'string', short: 'd' },
  'target-release': { type: 'string' },
} as const;

export async function runRollback(args: string[], ctx: CommandContext): Promise<void> {
  const { values } = parseArgs({ args, options: ROLLBACK_OPTIONS });
  const { client, appId, token } = connect(values, ctx);

  const result = await rollback(
    client,
    {
      appId,
      token,
      deployment: deploymentFlag(values.deployment, ctx),
      targetLabel: values['target-release'],
      signal: ctx.signal,
    },
    ctx.output
  );

  if (values.json) {
    ctx.print(formatJson(result));
  } else {
    ctx.output.success(`Rolled back to ${result.label}`);
    ctx.print(
      formatKeyValues([
        { key: 'Package ID', value: result.packageId },
        { key: 'Label', value: result.label },
        { key: 'App version', value: result.appVersion },
      ])
    );
  }

  await exportResult('rollback', result, ctx.output, {
    OTAPUSH_PACKAGE_ID: result.packageId,
    OTAPUSH_APP_VERSION: result.appVersion,
  });
}

const PROMOTE_OPTIONS = {
  ...GLOBAL_OPTIONS,
  'source-deployment': { type: 'string' },
  'destination-deployment': { type: 'string' },
  'label': { type: 'string' },
  'app-version': { type: 'string' },
  'description': { type: 'string' },
  'mandatory': { type: 'string' },
  'disabled': { type: 'string' },
  'rollout': { type: 'string' },
} as const;

export async function runPromote(args: string[], ctx: CommandContext): Promise<void> {
  const { values } = parseArgs({ args, options: PROMOTE_OPTIONS });
  const { client, appId, token } = connect(values, ctx);

  const result = await promote(
    client,
    {
      appId,
      token,
      sourceDeployment: deploymentFlag(values['source-deployment'], ctx),
      destDeployment: values['destination-deployment'] ?? '',
      label: values.label,
      appVersion: values['app-version'],
      description: values.description,
      mandatory: values.mandatory,
      disabled: values.disabled,
      rollout: values.rollout,
      signal: ctx.signal,
    },
    ctx.output
  );

  if (values.json) {
    ctx.print(formatJson(result));
  } else {
    ctx.output.success(`Promoted release ${result.label}`);
    ctx.print(
      formatKeyValues([
        { key: 'Package ID', value: result.packageId },
        { key: 'Label', value: result.label },
        { key: 'App version', value: result.appVersion },
        { key: 'Destination', value: result.destDeploymentId },
      ])
    );
  }

  await exportResult('promote', result, ctx.output, {
    OTAPUSH_PACKAGE_ID: result.packageId,
    OTAPUSH_APP_VERSION: result.appVersion,
  });
}

// Deployments

const DEPLOYMENT_OPTIONS = {
  ...GLOBAL_OPTIONS,
  'limit': { type: 'string' },
  'yes': { type: 'boolean', short: 'y' },
} as const;

function requireArg(value: string | undefined, message: string): string {
  if (!value) {
    throw new ValidationError(message);
  }
  return value;
}

export async function runDeployment(args: string[], ctx: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({ args, options: DEPLOYMENT_OPTIONS, allowPositionals: true });
  const [subcommand, target, newName] = positionals;
  const { client, appId } = connect(values, ctx);
  const { output, signal } = ctx;

  const resolveTarget = (): Promise<string> =>
    resolveDeployment(
      client,
      appId,
      requireArg(deploymentFlag(target, ctx), `deployment is required: pass a name or UUID, or set ${ENV_DEPLOYMENT}`),
      output,
      signal
    );

  switch (subcommand) {
    case 'list': {
      let deployments: Deployment[];
      try {
        deployments = await client.listDeployments(appId, signal);
      } catch (error) {
        throw wrapError('listing deployments', error);
      }
      if (values.json) {
        ctx.print(formatJson(deployments));
      } else if (deployments.length === 0) {
        output.info('No deployments found.');
      } else {
        ctx.print(formatTable(['NAME', 'ID'], deployments.map(d => [d.name, d.id])));
      }
      return;
    }

    case 'add': {
      const name = requireArg(target, 'deployment name is required: otapush deployment add <name>');
      let created: Deployment;
      try {
        created = await client.createDeployment(appId, { name }, signal);
      } catch (error) {
        throw wrapError('creating deployment', error);
      }
      if (values.json) {
        ctx.print(formatJson(created));
      } else {
        output.success(`Deployment "${created.name}" created (ID: ${created.id})`);
      }
      return;
    }

    case 'info': {
      const deploymentId = await resolveTarget();
      let deployment: Deployment;
      let packages: Package[];
      try {
        deployment = await client.getDeployment(appId, deploymentId, signal);
        packages = await client.listPackages(appId, deploymentId, signal);
      } catch (error) {
        throw wrapError('getting deployment', error);
      }
      const latest = packages.at(-1);
      if (values.json) {
        ctx.print(formatJson({ ...deployment, latestPackage: latest }));
        return;
      }
      output.step(`Deployment: ${deployment.name}`);
      const pairs: KeyValue[] = [{ key: 'ID', value: deployment.id }];
      if (deployment.key) pairs.push({ key: 'Key', value: deployment.key });
      if (deployment.createdAt) pairs.push({ key: 'Created', value: deployment.createdAt });
      pairs.push({ key: 'Releases', value: String(packages.length) });
      if (latest) {
        pairs.push({ key: 'Latest', value: `${latest.label} (${latest.appVersion})` });
      }
      ctx.print(formatKeyValues(pairs));
      return;
    }

    case 'history': {
      const deploymentId = await resolveTarget();
      let packages: Package[];
      try {
        packages = await client.listPackages(appId, deploymentId, signal);
      } catch (error) {
        throw wrapError('listing packages', error);
      }
      if (values.limit !== undefined) {
        const limit = Number(values.limit);
        if (!Number.isInteger(limit) || limit < 1) {
          throw new ValidationError(`limit must be a positive integer, got "${values.limit}"`);
        }
        packages = packages.slice(-limit);
      }
      if (values.json) {
        ctx.print(formatJson(packages));
      } else if (packages.length === 0) {
        output.info('No releases found.');
      } else {
        ctx.print(formatTable(PACKAGE_HEADERS, packageRows(packages)));
      }
      return;
    }

    case 'rename': {
      const name = requireArg(newName, 'new name is required: otapush deployment rename <deployment> <new-name>');
      const deploymentId = await resolveTarget();
      let renamed: Deployment;
      try {
        renamed = await client.renameDeployment(appId, deploymentId, { name }, signal);
      } catch (error) {
        throw wrapError('renaming deployment', error);
      }
      if (values.json) {
        ctx.print(formatJson(renamed));
      } else {
        output.success(`Deployment renamed to "${renamed.name}"`);
      }
      return;
    }

    case 'remove': {
      if (!values.yes) {
        throw new ValidationError('refusing to remove a deployment without --yes');
      }
      const deploymentId = await resolveTarget();
      try {
        await client.deleteDeployment(appId, deploymentId, signal);
      } catch (error) {
        throw wrapError('deleting deployment', error);
      }
      output.success(`Deployment ${deploymentId} removed`);
      return;
    }

    case 'clear': {
      if (!values.yes) {
        throw new ValidationError('refusing to clear a deployment without --yes');
      }
      const deploymentId = await resolveTarget();
      let packages: Package[];
      try {
        packages = await client.listPackages(appId, deploymentId, signal);
      } catch (error) {
        throw wrapError('listing packages', error);
      }

      // in listing order; the first failure stops the run
      let deleted = 0;
      for (const pkg of packages) {
        try {
          await client.deletePackage(appId, deploymentId, pkg.id, signal);
        } catch (error) {
          throw wrapError(`deleting package ${pkg.label}`, error);
        }
        deleted++;
      }

      if (values.json) {
        ctx.print(formatJson({ deployment: deploymentId, deleted }));
      } else if (deleted === 0) {
        output.info('No packages to delete.');
      } else {
        output.success(`Deleted ${deleted} package(s) from "${deploymentFlag(target, ctx)}"`);
      }
      return;
    }

    default:
      throw new ValidationError(
        `unknown deployment command "${subcommand ?? ''}": use list, add, info, history, rename, remove, or clear`
      );
  }
}

// Packages

const PACKAGE_OPTIONS = {
  ...GLOBAL_OPTIONS,
  'label': { type: 'string' },
  'yes': { type: 'boolean', short: 'y' },
} as const;

export async function runPackage(args: string[], ctx: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({ args, options: PACKAGE_OPTIONS, allowPositionals: true });
  const [subcommand, target] = positionals;
  const { client, appId } = connect(values, ctx);
  const { output, signal } = ctx;

  const deploymentRef = (): string =>
    requireArg(deploymentFlag(target, ctx), `deployment is required: pass a name or UUID, or set ${ENV_DEPLOYMENT}`);

  switch (subcommand) {
    case 'info': {
      const deploymentId = await resolveDeployment(client, appId, deploymentRef(), output, signal);
      const pkg = await resolvePackage(client, appId, deploymentId, values.label, output, signal);
      if (values.json) {
        ctx.print(formatJson(pkg));
      } else {
        ctx.print(formatKeyValues(packagePairs(pkg)));
      }
      return;
    }

    case 'status': {
      const deploymentId = await resolveDeployment(client, appId, deploymentRef(), output, signal);
      const label = values.label;
      const packageId =
        (label && normalizeUuid(label)) ||
        (await resolvePackage(client, appId, deploymentId, label, output, signal)).id;
      let status: PackageStatus;
      try {
        status = await client.getPackageStatus(appId, deploymentId, packageId, signal);
      } catch (error) {
        throw wrapError('checking package status', error);
      }
      if (values.json) {
        ctx.print(formatJson(status));
        return;
      }
      const pairs: KeyValue[] = [
        { key: 'Package ID', value: status.packageId || packageId },
        { key: 'Status', value: status.status },
      ];
      if (status.statusReason) pairs.push({ key: 'Reason', value: status.statusReason });
      ctx.print(formatKeyValues(pairs));
      return;
    }

    case 'remove': {
      const label = requireArg(values.label, 'release label is required: set --label');
      if (!values.yes) {
        throw new ValidationError('refusing to remove a release without --yes');
      }
      const deploymentId = await resolveDeployment(client, appId, deploymentRef(), output, signal);
      const pkg = await resolvePackageLabel(client, appId, deploymentId, label, output, signal);
      try {
        await client.deletePackage(appId, deploymentId, pkg.id, signal);
      } catch (error) {
        throw wrapError('deleting package', error);
      }
      output.success(`Release ${pkg.label} removed`);
      return;
    }

    default:
      throw new ValidationError(`unknown package command "${subcommand ?? ''}": use info, status, or remove`);
  }
}

// Setup

const AUTH_OPTIONS = {
  'token': { type: 'string' },
} as const;

export async function runAuth(args: string[], ctx: CommandContext): Promise<void> {
  const { values, positionals } = parseArgs({ args, options: AUTH_OPTIONS, allowPositionals: true });

  switch (positionals[0]) {
    case 'login': {
      const token = requireArg(
        values.token || ctx.env[ENV_API_TOKEN],
        `API token is required: set --token or ${ENV_API_TOKEN}`
      );
      const filePath = saveToken(ctx.locations, token);
      ctx.output.success(`Token saved to ${filePath}`);
      return;
    }

    case 'logout': {
      if (deleteToken(ctx.locations)) {
        ctx.output.success('Stored token removed');
      } else {
        ctx.output.info('No stored token found.');
      }
      return;
    }

    default:
      throw new ValidationError(`unknown auth command "${positionals[0] ?? ''}": use login or logout`);
  }
}

const INIT_OPTIONS = {
  'app-id': { type: 'string' },
  'api-url': { type: 'string' },
  'force': { type: 'boolean' },
} as const;

export async function runInit(args: string[], ctx: CommandContext): Promise<void> {
  const { values } = parseArgs({ args, options: INIT_OPTIONS });

  const appId = validateAppId(requireArg(values['app-id'], 'app ID is required: set --app-id'));

  if (loadProjectConfig(ctx.locations, ctx.output) && !values.force) {
    throw new ValidationError(`${PROJECT_CONFIG_FILE} already exists: use --force to overwrite it`);
  }

  const filePath = saveProjectConfig(ctx.locations, { app_id: appId, api_url: values['api-url'] });
  ctx.output.success(`Wrote ${filePath}`);
}
