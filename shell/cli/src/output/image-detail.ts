// cli/src/output/image-detail.ts - Latest-image detail (amiwatch latest)

import { ageInDays, type ImageDetail, type BlockDeviceRecord } from '@amiwatch/contracts';
import { isPastRotation } from '@amiwatch/inventory';
import { formatImageCreated } from './audit-report';

export function renderSearchHeader(params: { region: string; namePattern: string; owner: string }): string[] {
  return [
    `Searching for latest AMI in region: ${params.region}`,
    `Name pattern: ${params.namePattern}`,
    `Owner: ${params.owner}`,
    '='.repeat(50),
  ];
}

export function renderNoImageFound(): string[] {
  return [
    'No AMI found matching the specified criteria.',
    '',
    'Possible reasons:',
    '- No AMIs with the specified name pattern exist',
    '- AMIs might be owned by a different account',
    '- AMIs might be in a different region',
    "- AMIs might be in 'pending' or 'failed' state",
  ];
}

function formatBlockDevice(mapping: BlockDeviceRecord): string {
  if (!mapping.ebs) {
    return `  ${mapping.deviceName}: ${mapping.virtualName ?? 'N/A'} (instance store)`;
  }
  const { volumeSize, volumeType, encrypted } = mapping.ebs;
  const size = volumeSize !== undefined ? `${volumeSize}GB` : 'N/A';
  return `  ${mapping.deviceName}: ${size} (${volumeType ?? 'N/A'}) ${encrypted ? 'Encrypted' : 'Not Encrypted'}`;
}

/**
 * Full detail of one image, ending with the rotation verdict.
 * Age is recomputed from the creation date against `now`.
 */
export function renderImageDetail(image: ImageDetail, rotationDays: number, now: Date = new Date()): string[] {
  const ageDays = ageInDays(image.creationDate, now);
  const lines = [
    'Latest AMI Found:',
    '==================',
    `AMI ID:          ${image.imageId}`,
    `Name:            ${image.name}`,
    `Description:     ${image.description || 'N/A'}`,
    `Owner ID:        ${image.ownerId ?? 'N/A'}`,
    `Architecture:    ${image.architecture ?? 'N/A'}`,
    `Root Device:     ${image.rootDeviceType ?? 'N/A'}`,
    `Virtualization:  ${image.virtualizationType ?? 'N/A'}`,
    `State:           ${image.state ?? 'N/A'}`,
    `Created:         ${formatImageCreated(image.creationDate)}`,
    `Age:             ${ageDays} days`,
  ];

  if (image.tags.length > 0) {
    lines.push('Tags:');
    for (const tag of image.tags) {
      lines.push(`  ${tag.key}: ${tag.value}`);
    }
  }

  lines.push('');
  lines.push('Block Device Mappings:');
  lines.push(...image.blockDeviceMappings.map(formatBlockDevice));

  lines.push('');
  if (isPastRotation(ageDays, rotationDays)) {
    lines.push(`⚠️  WARNING: This AMI is ${ageDays} days old (>${rotationDays} days)`);
    lines.push('Consider updating to a newer AMI for security compliance.');
  } else {
    lines.push(`✅ AMI is within ${rotationDays}-day rotation policy (${ageDays} days old)`);
  }

  return lines;
}

/** The image as a plain object, for the --json envelope. */
export function toImageData(image: ImageDetail, rotationDays: number, now: Date = new Date()) {
  const ageDays = ageInDays(image.creationDate, now);
  return {
    image_id: image.imageId,
    name: image.name,
    description: image.description || null,
    owner_id: image.ownerId ?? null,
    architecture: image.architecture ?? null,
    root_device_type: image.rootDeviceType ?? null,
    virtualization_type: image.virtualizationType ?? null,
    state: image.state ?? null,
    created: image.creationDate.toISOString(),
    age_days: ageDays,
    past_rotation: isPastRotation(ageDays, rotationDays),
    tags: image.tags.map(tag => ({ key: tag.key, value: tag.value })),
    block_device_mappings: image.blockDeviceMappings.map(mapping => ({
      device_name: mapping.deviceName,
      ...(mapping.ebs
        ? {
            volume_size: mapping.ebs.volumeSize ?? null,
            volume_type: mapping.ebs.volumeType ?? null,
            encrypted: mapping.ebs.encrypted ?? false,
          }
        : { virtual_name: mapping.virtualName ?? null }),
    })),
  };
}
