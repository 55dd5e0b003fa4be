import { promises as fs } from 'fs';
import { z } from 'zod';
import { Inventory, ResolvedManifest } from '../types';
import { digestSchema } from '../registry/schemas';
import { withDigests } from '../registry/manifest';
import { formatImageRef } from '../utils/validation';
import { compareImages } from './filters';
import { errorMessage } from '../utils/errors';

export const DEFAULT_INVENTORY_PATH = 'images.json';

const digestEntrySchema = z.object({
  architecture: z.string().min(1),
  variant: z.string().min(1).optional(),
  digest: digestSchema,
});

const imageSchema = z.object({
  registry: z.string().min(1),
  repository: z.string().min(1),
  tag: z.string().min(1),
  digests: z.array(digestEntrySchema).default([]),
});

export const inventorySchema = z
  .object({
    images: z.array(imageSchema),
  })
  .superRefine((inventory, ctx) => {
    const seen = new Set<string>();
    inventory.images.forEach((image, index) => {
      const key = formatImageRef(image);
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['images', index],
          message: `duplicate image ${key}`,
        });
      }
      seen.add(key);
    });
  });

/**
 * Parse inventory JSON text
 */
export function parseInventory(text: string, source: string = DEFAULT_INVENTORY_PATH): Inventory {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Inventory ${source} is not valid JSON: ${errorMessage(error)}`);
  }

  const result = inventorySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Inventory ${source} is invalid: ${issues}`);
  }

  return {
    images: result.data.images.map((image) => withDigests(image, image.digests)),
  };
}

export async function loadInventory(path: string): Promise<Inventory> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new Error(`Cannot read inventory ${path}: ${errorMessage(error)}`);
  }
  return parseInventory(text, path);
}

/**
 * Serialize images sorted by registry, repository and tag
 */
export function renderInventory(images: readonly ResolvedManifest[]): string {
  const sorted = [...images].sort(compareImages);
  const document = {
    images: sorted.map((image) => ({
      registry: image.registry,
      repository: image.repository,
      tag: image.tag,
      digests: image.digests.map((entry) =>
        entry.variant
          ? { architecture: entry.architecture, variant: entry.variant, digest: entry.digest }
          : { architecture: entry.architecture, digest: entry.digest }
      ),
    })),
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}

export async function saveInventory(path: string, images: readonly ResolvedManifest[]): Promise<void> {
  await fs.writeFile(path, renderInventory(images), 'utf8');
}
