// cli/src/output/audit-report.ts - Fleet audit report (amiwatch check)

import { formatUtcSeconds, type ImageMetadata, type InstanceRecord } from '@amiwatch/contracts';
import { uniqueImageIds } from '@amiwatch/inventory';
import { formatTable } from '../config';

export interface AuditReportInput {
  instances: readonly InstanceRecord[];
  metadata: ReadonlyMap<string, ImageMetadata>;
  expired: readonly string[];
  rotationDays: number;
  /** Set when the image lookup failed; ages are unknown, so no verdict is given. */
  imagesUnavailable?: boolean;
}

const IMAGE_NAME_MAX = 29;

export function formatImageCreated(date: Date): string {
  return `${formatUtcSeconds(date)} UTC`;
}

/**
 * Render the audit as lines of text. Pure: inputs are read, never changed.
 */
export function renderAuditReport(input: AuditReportInput): string[] {
  const { instances, metadata, expired, rotationDays } = input;
  const imageIds = uniqueImageIds(instances);
  const lines: string[] = [];

  lines.push('');
  lines.push('SUMMARY:');
  lines.push(`Total EC2 instances: ${instances.length}`);
  lines.push(`Unique AMIs in use: ${imageIds.length}`);

  lines.push('');
  lines.push('EC2 INSTANCES:');
  lines.push(...formatTable(
    ['Instance ID', 'Instance Type', 'AMI ID', 'Launch Time'],
    instances.map(inst => [
      inst.instanceId,
      inst.instanceType,
      inst.imageId,
      inst.launchTime ? formatUtcSeconds(inst.launchTime) : 'Unknown',
    ]),
    [20, 15, 15, 20],
  ));

  lines.push('');
  lines.push('AMI INFORMATION:');
  lines.push(...formatTable(
    ['AMI ID', 'AMI Name', 'Created', 'Age (days)'],
    [...imageIds].sort().map(imageId => {
      const info = metadata.get(imageId);
      if (!info) return [imageId, 'Unknown', 'Unknown', 'Unknown'];
      return [imageId, info.name.slice(0, IMAGE_NAME_MAX), formatImageCreated(info.creationDate), String(info.ageDays)];
    }),
    [15, 30, 20, 10],
  ));

  lines.push('');
  if (input.imagesUnavailable) {
    lines.push('❓ AMI rotation status unavailable: AMI information could not be fetched.');
  } else if (expired.length > 0) {
    lines.push('⚠️  AMI ROTATION WARNING:');
    lines.push(`The following AMIs are older than ${rotationDays} days and should be rotated:`);
    for (const imageId of expired) {
      const info = metadata.get(imageId);
      lines.push(`  - ${imageId}: ${info?.name ?? 'Unknown'} (${info?.ageDays ?? 'Unknown'} days old)`);
    }
  } else {
    lines.push(`✅ All AMIs are within the ${rotationDays}-day rotation policy.`);
  }

  return lines;
}

/** The same audit as a plain object, for the --json envelope. */
export function toAuditData(region: string, input: AuditReportInput) {
  const { instances, metadata, expired, rotationDays } = input;
  const imageIds = uniqueImageIds(instances);
  const expiredSet = new Set(expired);
  return {
    region,
    rotation_days: rotationDays,
    summary: {
      total_instances: instances.length,
      unique_images: imageIds.length,
    },
    instances: instances.map(inst => ({
      instance_id: inst.instanceId,
      instance_type: inst.instanceType,
      image_id: inst.imageId,
      launch_time: inst.launchTime?.toISOString() ?? null,
      state: inst.state,
    })),
    images: [...imageIds].sort().map(imageId => {
      const info = metadata.get(imageId);
      return info
        ? {
            image_id: imageId,
            resolved: true,
            name: info.name,
            created: info.creationDate.toISOString(),
            age_days: info.ageDays,
            expired: expiredSet.has(imageId),
          }
        : { image_id: imageId, resolved: false };
    }),
    expired: [...expired],
    images_unavailable: input.imagesUnavailable ?? false,
  };
}
