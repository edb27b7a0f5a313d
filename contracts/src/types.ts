// types.ts - Cross-cutting Primitives and Inventory Records

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Whole days, floored */
export type DurationDays = number;

export type ProviderName = 'aws';

// Provider IDs (provider-specific format)
export type ProviderInstanceId = string; // i-xxxxx
export type ProviderImageId = string; // ami-xxxxx

/** Image owner selector: "self", an alias such as "amazon", or a 12-digit account id */
export type ImageOwner = 'self' | 'amazon' | 'aws-marketplace' | (string & {});

// =============================================================================
// INVENTORY RECORDS
// =============================================================================

/** A compute instance as seen by the fleet audit */
export interface InstanceRecord {
  instanceId: ProviderInstanceId;
  instanceType: string;
  imageId: ProviderImageId;
  launchTime?: Date;
  state: string;
}

export interface ImageMetadata {
  imageId: ProviderImageId;
  name: string; // "Unknown" when the image has none
  creationDate: Date;
  ageDays: DurationDays; // relative to the clock at fetch time
}

export interface ImageTag {
  key: string;
  value: string;
}

export interface BlockDeviceRecord {
  deviceName: string;
  ebs?: {
    volumeSize?: number; // GiB
    volumeType?: string;
    encrypted?: boolean;
  };
  virtualName?: string; // instance store (ephemeralN)
}

export interface ImageDetail extends ImageMetadata {
  description?: string;
  ownerId?: string;
  architecture?: string;
  rootDeviceType?: string;
  virtualizationType?: string;
  state?: string;
  tags: ImageTag[];
  blockDeviceMappings: BlockDeviceRecord[];
}

// =============================================================================
// ERROR CATEGORIES & EXIT CODES
// =============================================================================

export type ErrorCategory = 'validation';

/**
 * Process exit codes.
 *
 *   0 - report produced
 *   1 - a provider call failed
 *   2 - CLI error (bad args, unknown command)
 *   3 - AMIs past the rotation threshold (only with --strict)
 *   4 - no image matched the lookup
 */
export const EXIT_CODES = {
  OK: 0,
  PROVIDER_ERROR: 1,
  USAGE: 2,
  NON_COMPLIANT: 3,
  NOT_FOUND: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// DATE UTILITIES
// =============================================================================

const MS_PER_DAY = 86_400_000;

/**
 * Parse an EC2 ISO-8601 timestamp ("2024-03-01T12:00:00.000Z").
 * Returns null when the value is missing or unparsable.
 */
export function parseCreationDate(value: string | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Whole days elapsed between `from` and `now`, floored (negative for future dates). */
export function ageInDays(from: Date, now: Date = new Date()): DurationDays {
  return Math.floor((now.getTime() - from.getTime()) / MS_PER_DAY);
}

/** "YYYY-MM-DD HH:MM:SS" in UTC */
export function formatUtcSeconds(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
