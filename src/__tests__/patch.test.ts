import { beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { buildPatchRequest, patch } from '../patch';
import { PatchOptions } from '../types';
import { APP_ID, FakeClient, makePackage, RecordingOutput, STAGING_ID } from './helpers';

const base: PatchOptions = { appId: APP_ID, token: 'test-token', deployment: 'Staging' };

describe('buildPatchRequest', () => {
  it('sets only the supplied fields', () => {
    const request = buildPatchRequest({ ...base, rollout: '50' });

    expect(request).toStrictEqual({ rollout: 50 });
  });

  it('parses boolean spellings', () => {
    expect(buildPatchRequest({ ...base, mandatory: 'false', disabled: 'T' })).toStrictEqual({
      mandatory: false,
      disabled: true,
    });
  });

  it('passes text fields through', () => {
    expect(buildPatchRequest({ ...base, description: 'fix crash', appVersion: '1.0.1' })).toStrictEqual({
      description: 'fix crash',
      appVersion: '1.0.1',
    });
  });

  it.each(['0', '101', '-5', '5.5', 'half'])('rejects rollout %s', value => {
    expect(() => buildPatchRequest({ ...base, rollout: value })).toThrow(
      `rollout must be between 1 and 100, got "${value}"`
    );
  });

  it('rejects an unparseable boolean', () => {
    expect(() => buildPatchRequest({ ...base, mandatory: 'maybe' })).toThrow(
      'mandatory must be true or false, got "maybe"'
    );
  });
});

describe('patch', () => {
  let client: FakeClient;
  let output: RecordingOutput;

  beforeEach(() => {
    client = new FakeClient();
    client.packages = [makePackage({ id: 'pkg-1', label: 'v1' }), makePackage({ id: 'pkg-2', label: 'v2' })];
    output = new RecordingOutput();
  });

  it('requires at least one change', async () => {
    await expect(patch(client, base, output)).rejects.toThrow(
      'at least one change is required: set --rollout, --mandatory, --disabled, --description, or --app-version'
    );
    expect(client.listDeployments).not.toHaveBeenCalled();
  });

  it('rejects a bad value before any request', async () => {
    await expect(patch(client, { ...base, rollout: '150' }, output)).rejects.toBeInstanceOf(ValidationError);
    expect(client.listDeployments).not.toHaveBeenCalled();
  });

  it('patches the latest release when no label is given', async () => {
    client.patchPackage.mockResolvedValueOnce(
      makePackage({ id: 'pkg-2', label: 'v2', rollout: 50, mandatory: true, appVersion: '1.2.0' })
    );

    const result = await patch(client, { ...base, rollout: '50', mandatory: 'true' }, output);

    expect(client.patchPackage).toHaveBeenCalledWith(
      APP_ID,
      STAGING_ID,
      'pkg-2',
      { rollout: 50, mandatory: true },
      undefined
    );
    expect(result).toEqual({
      packageId: 'pkg-2',
      appId: APP_ID,
      deploymentId: STAGING_ID,
      label: 'v2',
      appVersion: '1.2.0',
      mandatory: true,
      disabled: false,
      rollout: 50,
      description: '',
    });
    expect(output.lines).toContain('step: Patching release v2');
  });

  it('patches the labelled release', async () => {
    await patch(client, { ...base, label: 'v1', disabled: 'true' }, output);

    expect(client.patchPackage).toHaveBeenCalledWith(APP_ID, STAGING_ID, 'pkg-1', { disabled: true }, undefined);
  });

  it('does not patch when the label is unknown', async () => {
    await expect(patch(client, { ...base, label: 'v7', disabled: 'true' }, output)).rejects.toThrow(
      'release label "v7" not found in deployment: check the label'
    );
    expect(client.patchPackage).not.toHaveBeenCalled();
  });

  it('wraps server failures', async () => {
    client.patchPackage.mockRejectedValueOnce(new Error('API returned HTTP 409: conflict'));

    await expect(patch(client, { ...base, rollout: '10' }, output)).rejects.toThrow(
      'patch failed: API returned HTTP 409: conflict'
    );
  });
});
