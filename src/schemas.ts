import { z } from 'zod';
import type { Deployment, Package, PackageStatus } from './types';

// The API speaks snake_case; everything past the client is camelCase.

export const DeploymentSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    created_at: z.string().optional(),
    key: z.string().optional(),
  })
  .transform(
    (d): Deployment => ({
      id: d.id,
      name: d.name,
      createdAt: d.created_at,
      key: d.key,
    })
  );

export const DeploymentListSchema = z.object({
  items: z.array(DeploymentSchema).nullish().transform(items => items ?? []),
});

const PackageCreatorSchema = z
  .object({
    id: z.string(),
    email: z.string().default(''),
    username: z.string().default(''),
    avatar_url: z.string().default(''),
  })
  .transform(c => ({ id: c.id, email: c.email, username: c.username, avatarUrl: c.avatar_url }));

export const PackageSchema = z
  .object({
    id: z.string(),
    label: z.string().default(''),
    app_version: z.string().default(''),
    description: z.string().default(''),
    mandatory: z.boolean().default(false),
    disabled: z.boolean().default(false),
    rollout: z.number().default(0),
    deployment_id: z.string().default(''),
    file_size_bytes: z.number().default(0),
    created_at: z.string().optional(),
    hash: z.string().optional(),
    file_name: z.string().optional(),
    created_by: PackageCreatorSchema.nullish(),
  })
  .transform(
    (p): Package => ({
      id: p.id,
      label: p.label,
      appVersion: p.app_version,
      description: p.description,
      mandatory: p.mandatory,
      disabled: p.disabled,
      rollout: p.rollout,
      deploymentId: p.deployment_id,
      fileSizeBytes: p.file_size_bytes,
      createdAt: p.created_at,
      hash: p.hash,
      fileName: p.file_name,
      createdBy: p.created_by ?? undefined,
    })
  );

export const PackageListSchema = z.object({
  items: z.array(PackageSchema).nullish().transform(items => items ?? []),
});

export const PackageStatusSchema = z
  .object({
    package_id: z.string().default(''),
    status: z.string(),
    status_reason: z.string().default(''),
  })
  .transform(
    (s): PackageStatus => ({
      packageId: s.package_id,
      status: s.status,
      statusReason: s.status_reason,
    })
  );

export const UploadSlotSchema = z.object({
  url: z.string().min(1),
  method: z.string().default('PUT'),
  headers: z.record(z.string()).default({}),
});

export const ProjectConfigSchema = z.object({
  app_id: z.string().optional(),
  api_url: z.string().url().optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export const UserConfigSchema = z.object({
  token: z.string().optional(),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

const uuidSchema = z.string().uuid();

/**
 * The canonical 8-4-4-4-12 form of a UUID given as canonical text, with a
 * `urn:uuid:` prefix, in braces, or as 32 bare hex digits.
 */
export function normalizeUuid(value: string): string | undefined {
  let candidate = value;
  if (/^urn:uuid:/i.test(candidate)) {
    candidate = candidate.slice('urn:uuid:'.length);
  } else if (candidate.startsWith('{') && candidate.endsWith('}')) {
    candidate = candidate.slice(1, -1);
  } else if (/^[0-9a-fA-F]{32}$/.test(candidate)) {
    candidate = [
      candidate.slice(0, 8),
      candidate.slice(8, 12),
      candidate.slice(12, 16),
      candidate.slice(16, 20),
      candidate.slice(20),
    ].join('-');
  }
  return uuidSchema.safeParse(candidate).success ? candidate : undefined;
}
