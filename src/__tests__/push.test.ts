import * as fs from 'fs';
import * as path from 'path';
import AdmZip from 'adm-zip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UploadError, ValidationError } from '../errors';
import { buildUploadUrlRequest, push } from '../push';
import { PushOptions } from '../types';
import { APP_ID, FakeClient, makeStatus, makeTempDir, RecordingOutput, removeDir, STAGING_ID } from './helpers';

const fast = { maxAttempts: 3, intervalMs: 1 };

describe('push', () => {
  let tmp: string;
  let bundle: string;
  let client: FakeClient;
  let output: RecordingOutput;

  const options = (overrides: Partial<PushOptions> = {}): PushOptions => ({
    appId: APP_ID,
    token: 'test-token',
    deployment: 'Staging',
    appVersion: '1.0.0',
    rollout: 100,
    bundlePath: bundle,
    ...overrides,
  });

  beforeEach(() => {
    tmp = makeTempDir('push');
    bundle = path.join(tmp, 'bundle');
    fs.mkdirSync(bundle);
    fs.writeFileSync(path.join(bundle, 'index.android.bundle'), 'console.log("release");');
    client = new FakeClient();
    output = new RecordingOutput();
  });

  afterEach(() => {
    removeDir(tmp);
  });

  it('uploads the archive and waits for processing', async () => {
    client.getPackageStatus.mockResolvedValueOnce(makeStatus('processing')).mockResolvedValueOnce(makeStatus('done'));

    const result = await push(client, options({ mandatory: true }), output, fast);

    const [appId, deploymentId, packageId, request] = client.getUploadUrl.mock.calls[0];
    expect(appId).toBe(APP_ID);
    expect(deploymentId).toBe(STAGING_ID);
    expect(request).toEqual({
      appVersion: '1.0.0',
      fileName: 'bundle.zip',
      fileSizeBytes: result.fileSizeBytes,
      mandatory: true,
    });
    expect(request).not.toHaveProperty('rollout');

    expect(client.uploadFile).toHaveBeenCalledTimes(1);
    const upload = client.uploadFile.mock.calls[0][0];
    expect(upload.url).toBe('https://storage.example.test/upload');
    expect(upload.method).toBe('PUT');
    expect(upload.headers).toEqual({ 'Content-Type': 'application/zip' });
    expect(upload.contentLength).toBe(result.fileSizeBytes);

    const uploaded = Buffer.concat(client.uploaded);
    expect(uploaded.length).toBe(result.fileSizeBytes);
    expect(new AdmZip(uploaded).getEntries().map(e => e.entryName)).toEqual(['index.android.bundle']);

    expect(client.getPackageStatus).toHaveBeenLastCalledWith(APP_ID, STAGING_ID, packageId, undefined);
    expect(result).toEqual({
      packageId,
      appId: APP_ID,
      deploymentId: STAGING_ID,
      appVersion: '1.0.0',
      status: 'done',
      fileSizeBytes: result.fileSizeBytes,
    });
    expect(fs.existsSync(`${bundle}.zip`)).toBe(false);
  });

  it('reports progress in order', async () => {
    const result = await push(client, options({ deployment: STAGING_ID }), output, fast);

    expect(output.lines).toEqual([
      `step: Packaging bundle: ${bundle}`,
      `info: Package size: ${result.fileSizeBytes} bytes`,
      'step: Requesting upload URL',
      'step: Uploading package',
      'step: Processing package',
    ]);
  });

  it('sends a partial rollout', async () => {
    await push(client, options({ rollout: 25, description: 'hotfix' }), output, fast);

    const request = client.getUploadUrl.mock.calls[0][3];
    expect(request.rollout).toBe(25);
    expect(request.description).toBe('hotfix');
    expect(request).not.toHaveProperty('mandatory');
    expect(request).not.toHaveProperty('disabled');
  });

  it('removes the archive when the upload fails', async () => {
    client.uploadFile.mockRejectedValueOnce(new UploadError(403, 'denied'));

    await expect(push(client, options(), output, fast)).rejects.toThrow(
      'uploading package: upload failed with HTTP 403: denied'
    );
    expect(fs.existsSync(`${bundle}.zip`)).toBe(false);
    expect(client.getPackageStatus).not.toHaveBeenCalled();
  });

  it('removes the archive when no upload slot is granted', async () => {
    client.getUploadUrl.mockRejectedValueOnce(new Error('quota exceeded'));

    await expect(push(client, options(), output, fast)).rejects.toThrow('requesting upload URL: quota exceeded');
    expect(fs.existsSync(`${bundle}.zip`)).toBe(false);
    expect(client.uploadFile).not.toHaveBeenCalled();
  });

  it('surfaces a processing failure', async () => {
    client.getPackageStatus.mockResolvedValueOnce(makeStatus('failed', 'invalid bundle'));

    await expect(push(client, options(), output, fast)).rejects.toThrow('package processing failed: invalid bundle');
  });

  it.each([
    [{ appId: '' }, 'app ID is required: set --app-id or OTAPUSH_APP_ID'],
    [{ token: '' }, "API token is required: set --token, OTAPUSH_API_TOKEN, or run 'otapush auth login'"],
    [{ deployment: '' }, 'deployment is required: set --deployment or OTAPUSH_DEPLOYMENT'],
    [{ appVersion: '' }, 'app version is required: set --app-version'],
    [{ bundlePath: '' }, 'bundle path is required: provide it as the first argument'],
    [{ rollout: 0 }, 'rollout must be between 1 and 100, got 0'],
    [{ rollout: 101 }, 'rollout must be between 1 and 100, got 101'],
    [{ rollout: 12.5 }, 'rollout must be between 1 and 100, got 12.5'],
  ])('rejects %o before any request', async (overrides, message) => {
    const promise = push(client, options(overrides), output, fast);

    await expect(promise).rejects.toBeInstanceOf(ValidationError);
    await expect(promise).rejects.toThrow(message);
    expect(client.listDeployments).not.toHaveBeenCalled();
    expect(client.getUploadUrl).not.toHaveBeenCalled();
  });

  it('rejects a bundle path that is a file', async () => {
    const file = path.join(bundle, 'index.android.bundle');

    await expect(push(client, options({ bundlePath: file }), output, fast)).rejects.toThrow(
      `bundle path is not a directory: ${file}`
    );
  });

  it('rejects a bundle path that does not exist', async () => {
    const missing = path.join(tmp, 'missing');

    await expect(push(client, options({ bundlePath: missing }), output, fast)).rejects.toThrow(
      `bundle path does not exist: ${missing}`
    );
  });
});

describe('buildUploadUrlRequest', () => {
  const base: PushOptions = {
    appId: APP_ID,
    token: 'test-token',
    deployment: 'Staging',
    appVersion: '2.3.0',
    rollout: 100,
    bundlePath: '/tmp/bundle',
  };

  it('leaves defaults out', () => {
    expect(buildUploadUrlRequest(base, 'bundle.zip', 512)).toStrictEqual({
      appVersion: '2.3.0',
      fileName: 'bundle.zip',
      fileSizeBytes: 512,
    });
  });

  it('includes flags that are set', () => {
    expect(
      buildUploadUrlRequest({ ...base, mandatory: true, disabled: true, rollout: 10, description: 'beta' }, 'b.zip', 1)
    ).toStrictEqual({
      appVersion: '2.3.0',
      fileName: 'b.zip',
      fileSizeBytes: 1,
      description: 'beta',
      mandatory: true,
      disabled: true,
      rollout: 10,
    });
  });
});
