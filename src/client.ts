import { z } from 'zod';
import { ApiError, UploadError, wrapError } from './errors';
import {
  DeploymentListSchema,
  DeploymentSchema,
  PackageListSchema,
  PackageSchema,
  PackageStatusSchema,
  UploadSlotSchema,
} from './schemas';
import {
  Client,
  CreateDeploymentRequest,
  Deployment,
  Package,
  PackageStatus,
  PatchRequest,
  PromoteRequest,
  RenameDeploymentRequest,
  RollbackRequest,
  UploadFileRequest,
  UploadSlot,
  UploadUrlRequest,
} from './types';

export const DEFAULT_API_URL = 'https://api.bitrise.io/release-management/v1';

type Method = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * Client backed by the management REST API. Every call is a single
 * request: failures surface as-is, nothing is retried.
 */
export class HttpClient implements Client {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly token: string
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async listDeployments(appId: string, signal?: AbortSignal): Promise<Deployment[]> {
    const data = await this.request('GET', this.deploymentsPath(appId), DeploymentListSchema, {
      signal,
    });
    return data.items;
  }

  async createDeployment(appId: string, request: CreateDeploymentRequest, signal?: AbortSignal): Promise<Deployment> {
    return this.request('POST', this.deploymentsPath(appId), DeploymentSchema, {
      body: { name: request.name },
      signal,
    });
  }

  async getDeployment(appId: string, deploymentId: string, signal?: AbortSignal): Promise<Deployment> {
    return this.request('GET', this.deploymentPath(appId, deploymentId), DeploymentSchema, {
      signal,
    });
  }

  async renameDeployment(
    appId: string,
    deploymentId: string,
    request: RenameDeploymentRequest,
    signal?: AbortSignal
  ): Promise<Deployment> {
    return this.request('PATCH', this.deploymentPath(appId, deploymentId), DeploymentSchema, {
      body: { name: request.name },
      signal,
    });
  }

  async deleteDeployment(appId: string, deploymentId: string, signal?: AbortSignal): Promise<void> {
    await this.request('DELETE', this.deploymentPath(appId, deploymentId), null, { signal });
  }

  async getUploadUrl(
    appId: string,
    deploymentId: string,
    packageId: string,
    request: UploadUrlRequest,
    signal?: AbortSignal
  ): Promise<UploadSlot> {
    const params = new URLSearchParams();
    params.set('app_version', request.appVersion);
    params.set('file_name', request.fileName);
    params.set('file_size_bytes', String(request.fileSizeBytes));
    if (request.description) {
      params.set('description', request.description);
    }
    if (request.mandatory) {
      params.set('mandatory', 'true');
    }
    if (request.disabled) {
      params.set('disabled', 'true');
    }
    if (request.rollout !== undefined && request.rollout > 0 && request.rollout < 100) {
      params.set('rollout', String(request.rollout));
    }

    const path = `${this.packagePath(appId, deploymentId, packageId)}/upload-url?${params.toString()}`;
    return this.request('GET', path, UploadSlotSchema, { signal });
  }

  async uploadFile(request: UploadFileRequest): Promise<void> {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: { ...request.headers, 'Content-Length': String(request.contentLength) },
        body: request.body,
        duplex: 'half',
        signal: request.signal,
      });
    } catch (error) {
      throw wrapError('uploading file', error);
    }

    if (!response.ok) {
      throw new UploadError(response.status, await response.text());
    }
  }

  async getPackageStatus(
    appId: string,
    deploymentId: string,
    packageId: string,
    signal?: AbortSignal
  ): Promise<PackageStatus> {
    const path = `${this.packagePath(appId, deploymentId, packageId)}/status`;
    return this.request('GET', path, PackageStatusSchema, { signal });
  }

  async listPackages(appId: string, deploymentId: string, signal?: AbortSignal): Promise<Package[]> {
    const path = `${this.deploymentPath(appId, deploymentId)}/packages`;
    const data = await this.request('GET', path, PackageListSchema, { signal });
    return data.items;
  }

  async getPackage(appId: string, deploymentId: string, packageId: string, signal?: AbortSignal): Promise<Package> {
    const path = this.packagePath(appId, deploymentId, packageId);
    return this.request('GET', path, PackageSchema, { signal });
  }

  async patchPackage(
    appId: string,
    deploymentId: string,
    packageId: string,
    request: PatchRequest,
    signal?: AbortSignal
  ): Promise<Package> {
    // JSON.stringify drops undefined, so unset fields never reach the wire
    const body = {
      rollout: request.rollout,
      mandatory: request.mandatory,
      disabled: request.disabled,
      description: request.description,
      app_version: request.appVersion,
    };
    const path = this.packagePath(appId, deploymentId, packageId);
    return this.request('PATCH', path, PackageSchema, { body, signal });
  }

  async deletePackage(appId: string, deploymentId: string, packageId: string, signal?: AbortSignal): Promise<void> {
    const path = this.packagePath(appId, deploymentId, packageId);
    await this.request('DELETE', path, null, { signal });
  }

  async rollback(
    appId: string,
    deploymentId: string,
    request: RollbackRequest,
    signal?: AbortSignal
  ): Promise<Package> {
    const path = `${this.deploymentPath(appId, deploymentId)}/rollback`;
    return this.request('POST', path, PackageSchema, {
      body: { package_id: request.packageId || undefined },
      signal,
    });
  }

  async promote(appId: string, deploymentId: string, request: PromoteRequest, signal?: AbortSignal): Promise<Package> {
    const path = `${this.deploymentPath(appId, deploymentId)}/promote`;
    return this.request('POST', path, PackageSchema, {
      body: {
        target_deployment_id: request.targetDeploymentId,
        package_id: request.packageId || undefined,
        app_version: request.appVersion || undefined,
        description: request.description || undefined,
        disabled: request.disabled || undefined,
        mandatory: request.mandatory || undefined,
        rollout: request.rollout || undefined,
      },
      signal,
    });
  }

  private deploymentsPath(appId: string): string {
    return `/connected-apps/${encodeURIComponent(appId)}/code-push/deployments`;
  }

  private deploymentPath(appId: string, deploymentId: string): string {
    return `${this.deploymentsPath(appId)}/${encodeURIComponent(deploymentId)}`;
  }

  private packagePath(appId: string, deploymentId: string, packageId: string): string {
    return `${this.deploymentPath(appId, deploymentId)}/packages/${encodeURIComponent(packageId)}`;
  }

  private request<S extends z.ZodTypeAny>(
    method: Method,
    path: string,
    schema: S,
    options: { body?: Record<string, unknown>; signal?: AbortSignal }
  ): Promise<z.output<S>>;
  private request(
    method: Method,
    path: string,
    schema: null,
    options: { body?: Record<string, unknown>; signal?: AbortSignal }
  ): Promise<void>;
  private async request(
    method: Method,
    path: string,
    schema: z.ZodTypeAny | null,
    options: { body?: Record<string, unknown>; signal?: AbortSignal }
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      'Authorization': this.token,
      'Accept': 'application/json',
    };
    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: options.signal,
      });
    } catch (error) {
      throw wrapError(`sending request to ${path.split('?')[0]}`, error);
    }

    if (!response.ok) {
      throw new ApiError(response.status, await response.text());
    }

    if (!schema) {
      return undefined;
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw wrapError('decoding response', error);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw wrapError('decoding response', parsed.error);
    }
    return parsed.data;
  }
}
