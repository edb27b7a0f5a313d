// audit/images.ts - Image selection helpers

import type { ImageMetadata, InstanceRecord } from "@amiwatch/contracts";

/** Distinct image ids across the instances, in first-seen order. */
export function uniqueImageIds(instances: readonly InstanceRecord[]): string[] {
  return [...new Set(instances.map((inst) => inst.imageId))];
}

/**
 * Image with the latest creation date. Strict "later wins": among equal
 * timestamps the first one in input order is kept.
 */
export function selectLatestImage<T extends ImageMetadata>(images: readonly T[]): T | null {
  let latest: T | null = null;
  for (const image of images) {
    if (!latest || image.creationDate.getTime() > latest.creationDate.getTime()) {
      latest = image;
    }
  }
  return latest;
}
