import * as core from '@actions/core';
import { HttpClient } from './client';
import {
  CommandContext,
  runAuth,
  runDeployment,
  runInit,
  runPackage,
  runPatch,
  runPromote,
  runPush,
  runRollback,
} from './commands';
import { defaultLocations } from './config';
import { ValidationError } from './errors';
import { CoreOutput } from './output';

export const VERSION = '0.1.0';

export const HELP = `otapush - publish and manage over-the-air update releases

Usage:
  otapush push <bundle-dir> --deployment <name|id> --app-version <version>
               [--description <text>] [--mandatory] [--disabled] [--rollout <1-100>]
  otapush patch --deployment <name|id> [--label <label>] [--rollout <1-100>]
               [--mandatory <bool>] [--disabled <bool>] [--description <text>] [--app-version <version>]
  otapush rollback --deployment <name|id> [--target-release <label>]
  otapush promote --source-deployment <name|id> --destination-deployment <name|id> [--label <label>]
               [--app-version <version>] [--description <text>] [--mandatory <bool>]
               [--disabled <bool>] [--rollout <1-100>]
  otapush deployment list
  otapush deployment add <name>
  otapush deployment info <name|id>
  otapush deployment history <name|id> [--limit <n>]
  otapush deployment rename <name|id> <new-name>
  otapush deployment remove <name|id> --yes
  otapush deployment clear <name|id> --yes
  otapush package info <deployment> [--label <label>]
  otapush package status <deployment> [--label <label>]
  otapush package remove <deployment> --label <label> --yes
  otapush auth login --token <token>
  otapush auth logout
  otapush init --app-id <uuid> [--api-url <url>] [--force]

Global options:
  --app-id    connected app UUID (env: OTAPUSH_APP_ID, or .otapush.json)
  --token     API token (env: OTAPUSH_API_TOKEN, or 'otapush auth login')
  --api-url   API base URL (env: OTAPUSH_API_URL)
  --json      print the result as JSON
  --help      show this help
  --version   show the version
`;

type Handler = (args: string[], ctx: CommandContext) => Promise<void>;

const COMMANDS: Record<string, Handler> = {
  push: runPush,
  patch: runPatch,
  rollback: runRollback,
  promote: runPromote,
  deployment: runDeployment,
  package: runPackage,
  auth: runAuth,
  init: runInit,
};

export function createContext(argv: string[], signal?: AbortSignal): CommandContext {
  return {
    output: new CoreOutput(argv.includes('--json')),
    print: text => core.info(text),
    locations: defaultLocations(),
    env: process.env,
    createClient: credentials => new HttpClient(credentials.apiUrl, credentials.token),
    signal,
  };
}

export async function main(argv: string[], ctx: CommandContext): Promise<void> {
  const [command, ...args] = argv;

  if (!command || command === '--help' || command === '-h' || command === 'help') {
    ctx.print(HELP);
    return;
  }
  if (command === '--version' || command === '-v') {
    ctx.print(`otapush v${VERSION}`);
    return;
  }

  const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    throw new ValidationError(`unknown command "${command}": run 'otapush --help' for usage`);
  }
  if (args.includes('--help') || args.includes('-h')) {
    ctx.print(HELP);
    return;
  }

  await handler(args, ctx);
}
