import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import { Output } from '../output';
import { Client, Deployment, Package, PackageStatus } from '../types';

export const APP_ID = '0b6e2f9a-3c4d-4e5f-8a6b-7c8d9e0f1a2b';
export const STAGING_ID = 'e7a3c1d2-5b4f-4c8e-9a1b-2c3d4e5f6a7b';
export const PRODUCTION_ID = 'f1e2d3c4-b5a6-4978-8a9b-0c1d2e3f4a5b';

export class RecordingOutput implements Output {
  readonly lines: string[] = [];

  step(message: string): void {
    this.lines.push(`step: ${message}`);
  }

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  success(message: string): void {
    this.lines.push(`success: ${message}`);
  }

  warning(message: string): void {
    this.lines.push(`warning: ${message}`);
  }
}

export function makePackage(overrides: Partial<Package> = {}): Package {
  return {
    id: 'pkg-1',
    label: 'v1',
    appVersion: '1.0.0',
    description: '',
    mandatory: false,
    disabled: false,
    rollout: 100,
    deploymentId: STAGING_ID,
    fileSizeBytes: 1024,
    ...overrides,
  };
}

export function makeStatus(status: string, statusReason = ''): PackageStatus {
  return { packageId: 'pkg-1', status, statusReason };
}

/** In-memory stand-in for the management API. */
export class FakeClient implements Client {
  deployments: Deployment[] = [
    { id: STAGING_ID, name: 'Staging' },
    { id: PRODUCTION_ID, name: 'Production' },
  ];
  packages: Package[] = [];
  readonly uploaded: Buffer[] = [];

  listDeployments = vi.fn<Client['listDeployments']>(async () => this.deployments);
  createDeployment = vi.fn<Client['createDeployment']>(async (_appId, request) => ({
    id: 'new-deployment-id',
    name: request.name,
  }));
  getDeployment = vi.fn<Client['getDeployment']>(async (_appId, deploymentId) => {
    const found = this.deployments.find(d => d.id === deploymentId);
    if (!found) throw new Error(`no deployment ${deploymentId}`);
    return found;
  });
  renameDeployment = vi.fn<Client['renameDeployment']>(async (_appId, deploymentId, request) => ({
    id: deploymentId,
    name: request.name,
  }));
  deleteDeployment = vi.fn<Client['deleteDeployment']>(async () => undefined);
  getUploadUrl = vi.fn<Client['getUploadUrl']>(async () => ({
    url: 'https://storage.example.test/upload',
    method: 'PUT',
    headers: { 'Content-Type': 'application/zip' },
  }));
  uploadFile = vi.fn<Client['uploadFile']>(async request => {
    for await (const chunk of request.body) {
      this.uploaded.push(Buffer.from(chunk));
    }
  });
  getPackageStatus = vi.fn<Client['getPackageStatus']>(async () => makeStatus('done'));
  listPackages = vi.fn<Client['listPackages']>(async () => this.packages);
  getPackage = vi.fn<Client['getPackage']>(async (_appId, _deploymentId, packageId) => makePackage({ id: packageId }));
  patchPackage = vi.fn<Client['patchPackage']>(async (_appId, _deploymentId, packageId) =>
    makePackage({ id: packageId })
  );
  deletePackage = vi.fn<Client['deletePackage']>(async () => undefined);
  rollback = vi.fn<Client['rollback']>(async () => makePackage());
  promote = vi.fn<Client['promote']>(async () => makePackage());
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `otapush-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
