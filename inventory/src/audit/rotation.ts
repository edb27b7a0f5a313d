// audit/rotation.ts - Rotation policy checks

import { ROTATION_POLICY, type DurationDays, type ImageMetadata } from "@amiwatch/contracts";

export function isPastRotation(
  ageDays: DurationDays,
  rotationDays: DurationDays = ROTATION_POLICY.DEFAULT_DAYS,
): boolean {
  return ageDays > rotationDays;
}

/**
 * Ids of images older than the rotation threshold (strictly greater), in map
 * order. Ids missing from the map are never reported.
 */
export function selectExpiredImages(
  metadata: ReadonlyMap<string, ImageMetadata>,
  rotationDays: DurationDays = ROTATION_POLICY.DEFAULT_DAYS,
): string[] {
  const expired: string[] = [];
  for (const [imageId, info] of metadata) {
    if (isPastRotation(info.ageDays, rotationDays)) expired.push(imageId);
  }
  return expired;
}
