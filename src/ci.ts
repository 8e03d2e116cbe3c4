import * as core from '@actions/core';
import * as github from '@actions/github';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DefaultArtifactClient } from '@actions/artifact';
import { errorMessage } from './errors';
import { isGitHubActions, Output } from './output';

export type ResultCommand = 'push' | 'patch' | 'rollback' | 'promote';

export function isBitriseEnvironment(): boolean {
  return Boolean(process.env.BITRISE_BUILD_NUMBER || process.env.BITRISE_DEPLOY_DIR);
}

export function summaryFileName(command: ResultCommand): string {
  return `otapush-${command}-summary.json`;
}

function kebabCase(key: string): string {
  return key.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`);
}

/** Write a summary into the Bitrise deploy directory so it shows up as a build artifact. */
export function writeToDeployDir(fileName: string, data: string): string {
  const deployDir = process.env.BITRISE_DEPLOY_DIR;
  if (!deployDir) {
    throw new Error('BITRISE_DEPLOY_DIR is not set');
  }
  fs.mkdirSync(deployDir, { recursive: true });
  const destPath = path.join(deployDir, fileName);
  fs.writeFileSync(destPath, data);
  return destPath;
}

async function uploadSummaryArtifact(command: ResultCommand, summary: Record<string, unknown>): Promise<string> {
  const artifact = new DefaultArtifactClient();

  const rootDir = fs.mkdtempSync(path.join(process.env.RUNNER_TEMP || os.tmpdir(), 'otapush-'));
  const summaryFile = path.join(rootDir, summaryFileName(command));
  fs.writeFileSync(summaryFile, JSON.stringify(summary, null, 2));

  const artifactName = `otapush-${command}-summary-${github.context.runId}`;
  await artifact.uploadArtifact(artifactName, [summaryFile], rootDir);
  return artifactName;
}

async function exportToGitHubActions(
  command: ResultCommand,
  result: object,
  variables: Record<string, string>,
  output: Output
): Promise<void> {
  for (const [key, value] of Object.entries(result)) {
    core.setOutput(kebabCase(key), value);
  }

  for (const [name, value] of Object.entries(variables)) {
    core.exportVariable(name, value);
  }

  const summary = {
    ...result,
    commitHash: github.context.sha,
    runNumber: github.context.runNumber,
    workflow: github.context.workflow,
  };

  try {
    const artifactName = await uploadSummaryArtifact(command, summary);
    output.info(`Summary uploaded as artifact: ${artifactName}`);
  } catch (error) {
    output.warning(`failed to upload ${summaryFileName(command)}: ${errorMessage(error)}`);
  }
}

/**
 * Hand a command's result to the CI system running it, if any. This is a
 * side channel: problems are reported as warnings and never fail the command.
 * `variables` are exported to later steps where the CI supports it.
 */
export async function exportResult(
  command: ResultCommand,
  result: object,
  output: Output,
  variables: Record<string, string> = {}
): Promise<void> {
  if (isGitHubActions()) {
    try {
      await exportToGitHubActions(command, result, variables, output);
    } catch (error) {
      output.warning(`failed to export ${command} outputs: ${errorMessage(error)}`);
    }
  }

  if (isBitriseEnvironment()) {
    const fileName = summaryFileName(command);
    try {
      const destPath = writeToDeployDir(fileName, JSON.stringify(result, null, 2));
      output.info(`Summary exported to: ${destPath}`);
    } catch (error) {
      output.warning(`failed to export ${fileName}: ${errorMessage(error)}`);
    }
  }
}
