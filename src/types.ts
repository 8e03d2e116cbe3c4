export interface Deployment {
  id: string;
  name: string;
  createdAt?: string;
  key?: string;
}

export interface PackageCreator {
  id: string;
  email: string;
  username: string;
  avatarUrl: string;
}

export interface Package {
  id: string;
  label: string;
  appVersion: string;
  description: string;
  mandatory: boolean;
  disabled: boolean;
  rollout: number;
  deploymentId: string;
  fileSizeBytes: number;
  createdAt?: string;
  hash?: string;
  fileName?: string;
  createdBy?: PackageCreator;
}

export const STATUS_PROCESSING = 'processing';
export const STATUS_DONE = 'done';
export const STATUS_FAILED = 'failed';

export interface PackageStatus {
  packageId: string;
  // processing | done | failed; unknown values are treated as non-terminal
  status: string;
  statusReason: string;
}

export interface PackageRef {
  appId: string;
  deploymentId: string;
  packageId: string;
}

export interface UploadSlot {
  url: string;
  method: string;
  headers: Record<string, string>;
}

export interface UploadUrlRequest {
  appVersion: string;
  fileName: string;
  fileSizeBytes: number;
  description?: string;
  mandatory?: boolean;
  disabled?: boolean;
  rollout?: number;
}

export interface UploadFileRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: AsyncIterable<Uint8Array>;
  contentLength: number;
  signal?: AbortSignal;
}

export interface PollConfig {
  maxAttempts: number;
  intervalMs: number;
}

export const DEFAULT_POLL_CONFIG: Readonly<PollConfig> = Object.freeze({
  maxAttempts: 60,
  intervalMs: 2000,
});

export interface CreateDeploymentRequest {
  name: string;
}

export interface RenameDeploymentRequest {
  name: string;
}

/** Unset fields are left out of the request body entirely. */
export interface PatchRequest {
  rollout?: number;
  mandatory?: boolean;
  disabled?: boolean;
  description?: string;
  appVersion?: string;
}

export interface RollbackRequest {
  packageId?: string;
}

export interface PromoteRequest {
  targetDeploymentId: string;
  packageId?: string;
  appVersion?: string;
  description?: string;
  mandatory?: string;
  disabled?: string;
  rollout?: string;
}

// Capabilities. Each workflow depends only on the slice of the API it calls.

export interface DeploymentLister {
  listDeployments(appId: string, signal?: AbortSignal): Promise<Deployment[]>;
}

export interface PackageLister {
  listPackages(appId: string, deploymentId: string, signal?: AbortSignal): Promise<Package[]>;
}

export interface UploadSlotProvider {
  getUploadUrl(
    appId: string,
    deploymentId: string,
    packageId: string,
    request: UploadUrlRequest,
    signal?: AbortSignal
  ): Promise<UploadSlot>;
}

export interface FileUploader {
  uploadFile(request: UploadFileRequest): Promise<void>;
}

export interface StatusChecker {
  getPackageStatus(
    appId: string,
    deploymentId: string,
    packageId: string,
    signal?: AbortSignal
  ): Promise<PackageStatus>;
}

export interface PackagePatcher {
  patchPackage(
    appId: string,
    deploymentId: string,
    packageId: string,
    request: PatchRequest,
    signal?: AbortSignal
  ): Promise<Package>;
}

export interface ReleaseRollbacker {
  rollback(appId: string, deploymentId: string, request: RollbackRequest, signal?: AbortSignal): Promise<Package>;
}

export interface ReleasePromoter {
  promote(appId: string, deploymentId: string, request: PromoteRequest, signal?: AbortSignal): Promise<Package>;
}

export type PushClient = DeploymentLister & UploadSlotProvider & FileUploader & StatusChecker;
export type PatchClient = DeploymentLister & PackageLister & PackagePatcher;
export type RollbackClient = DeploymentLister & PackageLister & ReleaseRollbacker;
export type PromoteClient = DeploymentLister & PackageLister & ReleasePromoter;

export interface Client
  extends DeploymentLister,
    PackageLister,
    UploadSlotProvider,
    FileUploader,
    StatusChecker,
    PackagePatcher,
    ReleaseRollbacker,
    ReleasePromoter {
  createDeployment(appId: string, request: CreateDeploymentRequest, signal?: AbortSignal): Promise<Deployment>;
  getDeployment(appId: string, deploymentId: string, signal?: AbortSignal): Promise<Deployment>;
  renameDeployment(
    appId: string,
    deploymentId: string,
    request: RenameDeploymentRequest,
    signal?: AbortSignal
  ): Promise<Deployment>;
  deleteDeployment(appId: string, deploymentId: string, signal?: AbortSignal): Promise<void>;
  getPackage(appId: string, deploymentId: string, packageId: string, signal?: AbortSignal): Promise<Package>;
  deletePackage(appId: string, deploymentId: string, packageId: string, signal?: AbortSignal): Promise<void>;
}

// Workflow options and results

export interface BaseOptions {
  appId: string;
  token: string;
  signal?: AbortSignal;
}

export interface PushOptions extends BaseOptions {
  deployment: string;
  appVersion: string;
  description?: string;
  mandatory?: boolean;
  disabled?: boolean;
  rollout: number;
  bundlePath: string;
}

export interface PushResult {
  packageId: string;
  appId: string;
  deploymentId: string;
  appVersion: string;
  status: string;
  fileSizeBytes: number;
}

export interface PatchOptions extends BaseOptions {
  deployment: string;
  label?: string;
  rollout?: string;
  mandatory?: string;
  disabled?: string;
  description?: string;
  appVersion?: string;
}

export interface PatchResult {
  packageId: string;
  appId: string;
  deploymentId: string;
  label: string;
  appVersion: string;
  mandatory: boolean;
  disabled: boolean;
  rollout: number;
  description: string;
}

export interface RollbackOptions extends BaseOptions {
  deployment: string;
  targetLabel?: string;
}

export interface RollbackResult {
  packageId: string;
  appId: string;
  deploymentId: string;
  label: string;
  appVersion: string;
}

export interface PromoteOptions extends BaseOptions {
  sourceDeployment: string;
  destDeployment: string;
  label?: string;
  appVersion?: string;
  description?: string;
  mandatory?: string;
  disabled?: string;
  rollout?: string;
}

export interface PromoteResult {
  packageId: string;
  appId: string;
  sourceDeploymentId: string;
  destDeploymentId: string;
  label: string;
  appVersion: string;
  description: string;
}
