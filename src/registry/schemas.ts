/**
 * Zod schemas for the registry responses the resolver reads.
 *
 * Objects use `.passthrough()`: registries add fields freely and only the
 * ones listed here are relied upon.
 */

import { z } from 'zod';

export const digestSchema = z.string().regex(/^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-zA-Z0-9=_-]+$/, 'Invalid digest format');

/**
 * Token endpoint response. Docker Hub sends `token`, OAuth2-style
 * endpoints may only send `access_token`.
 */
export const tokenResponseSchema = z
  .object({
    token: z.string().min(1).optional(),
    access_token: z.string().min(1).optional(),
    expires_in: z.number().optional(),
  })
  .passthrough();

export const platformSchema = z
  .object({
    architecture: z.string(),
    os: z.string().optional(),
    variant: z.string().optional(),
  })
  .passthrough();

/**
 * Manifest list (Docker) and image index (OCI) share this shape
 */
export const manifestListSchema = z
  .object({
    schemaVersion: z.number().optional(),
    manifests: z.array(
      z
        .object({
          digest: digestSchema,
          mediaType: z.string().optional(),
          platform: platformSchema.optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();

/**
 * Single-platform image manifest; only the config reference is needed
 */
export const imageManifestSchema = z
  .object({
    schemaVersion: z.number().optional(),
    config: z
      .object({
        digest: digestSchema,
        mediaType: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

/**
 * Image config blob
 */
export const imageConfigSchema = z
  .object({
    architecture: z.string(),
    os: z.string().optional(),
    variant: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof tokenResponseSchema>;
export type ManifestList = z.infer<typeof manifestListSchema>;
export type ImageManifest = z.infer<typeof imageManifestSchema>;
export type ImageConfig = z.infer<typeof imageConfigSchema>;
