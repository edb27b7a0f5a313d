// provider/compute/aws.ts - AWS EC2 Inventory
//
// Read-only EC2 queries behind the fleet audit and the latest-image lookup.
// Uses the AWS SDK v3 directly; credentials come from the SDK's default chain.
// Every query returns a ProviderResult instead of throwing, so callers can
// tell "nothing there" apart from "the call failed".

import {
  EC2Client,
  DescribeInstancesCommand,
  DescribeImagesCommand,
  type Image,
  type Instance,
} from "@aws-sdk/client-ec2";
import {
  ok,
  parseCreationDate,
  ageInDays,
  type ImageDetail,
  type ImageMetadata,
  type ImageOwner,
  type InstanceRecord,
} from "@amiwatch/contracts";
import {
  ConcreteProviderError,
  withProviderResult,
  type ProviderResult,
} from "../errors";
import { selectLatestImage } from "../../audit/images";

// =============================================================================
// AWS Error Handling
// =============================================================================

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "TimeoutError",
  "NetworkingError",
]);

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" && field !== "" ? field : undefined;
}

/**
 * Extract AWS error code from SDK v3 errors.
 *
 * Service errors carry the code in .name (SDK v3), .Code (some shapes) or
 * .code (older patterns). Transport failures are plain Node errors whose
 * .name is just "Error", so a socket errno in .code wins over it.
 */
export function getAwsErrorCode(err: unknown): string {
  if (err && typeof err === "object") {
    const errno = stringField(err, "code");
    if (errno && NETWORK_ERROR_CODES.has(errno)) return errno;
    const name = stringField(err, "name");
    return (name !== "Error" ? name : undefined)
      ?? stringField(err, "Code")
      ?? errno
      ?? "Unknown";
  }
  return "Unknown";
}

/** Map AWS EC2 error codes to provider error taxonomy. */
export function mapEC2Error(awsErrorCode: string, message: string): ConcreteProviderError {
  const details = { awsErrorCode };
  switch (awsErrorCode) {
    case "AuthFailure":
    case "UnauthorizedAccess":
    case "UnauthorizedOperation":
    case "InvalidClientTokenId":
    case "SignatureDoesNotMatch":
    case "ExpiredToken":
    case "RequestExpired":
    case "CredentialsProviderError":
      return new ConcreteProviderError("aws", "AUTH_ERROR", message, { details });
    case "RequestLimitExceeded":
    case "Throttling":
    case "ThrottlingException":
      return new ConcreteProviderError("aws", "RATE_LIMIT_ERROR", message, { retryable: true, details });
    case "InvalidParameterValue":
    case "InvalidParameterCombination":
    case "InvalidFilter":
    case "InvalidAMIID.Malformed":
    case "InvalidUserID.Malformed":
      return new ConcreteProviderError("aws", "INVALID_REQUEST", message, { details });
    case "InvalidAMIID.NotFound":
    case "InvalidAMIID.Unavailable":
      return new ConcreteProviderError("aws", "NOT_FOUND", message, { details });
    case "OptInRequired":
    case "UnknownEndpoint":
      return new ConcreteProviderError("aws", "REGION_UNAVAILABLE", message, { details });
    default:
      if (NETWORK_ERROR_CODES.has(awsErrorCode)) {
        return new ConcreteProviderError("aws", "NETWORK_ERROR", message, { retryable: true, details });
      }
      return new ConcreteProviderError("aws", "PROVIDER_INTERNAL", message, { details });
  }
}

function toEC2Error(err: unknown): ConcreteProviderError {
  return mapEC2Error(getAwsErrorCode(err), err instanceof Error ? err.message : String(err));
}

// =============================================================================
// SDK Record Mapping
// =============================================================================

/**
 * Map an SDK Instance to the audit's record shape.
 * Returns null for records missing the instance or image id.
 */
export function toInstanceRecord(inst: Instance): InstanceRecord | null {
  if (!inst.InstanceId || !inst.ImageId) return null;
  return {
    instanceId: inst.InstanceId,
    instanceType: inst.InstanceType ?? "unknown",
    imageId: inst.ImageId,
    launchTime: inst.LaunchTime,
    state: inst.State?.Name ?? "unknown",
  };
}

/** Returns null when the image has no id or no parsable creation date. */
export function toImageMetadata(image: Image, now: Date = new Date()): ImageMetadata | null {
  const creationDate = parseCreationDate(image.CreationDate);
  if (!image.ImageId || !creationDate) return null;
  return {
    imageId: image.ImageId,
    name: image.Name || "Unknown",
    creationDate,
    ageDays: ageInDays(creationDate, now),
  };
}

export function toImageDetail(image: Image, now: Date = new Date()): ImageDetail | null {
  const metadata = toImageMetadata(image, now);
  if (!metadata) return null;
  return {
    ...metadata,
    description: image.Description,
    ownerId: image.OwnerId,
    architecture: image.Architecture,
    rootDeviceType: image.RootDeviceType,
    virtualizationType: image.VirtualizationType,
    state: image.State,
    tags: (image.Tags ?? []).map((tag) => ({ key: tag.Key ?? "", value: tag.Value ?? "" })),
    blockDeviceMappings: (image.BlockDeviceMappings ?? []).map((bdm) => ({
      deviceName: bdm.DeviceName ?? "unknown",
      ...(bdm.Ebs
        ? {
            ebs: {
              volumeSize: bdm.Ebs.VolumeSize,
              volumeType: bdm.Ebs.VolumeType,
              encrypted: bdm.Ebs.Encrypted,
            },
          }
        : {}),
      ...(bdm.VirtualName ? { virtualName: bdm.VirtualName } : {}),
    })),
  };
}

// =============================================================================
// EC2 Inventory
// =============================================================================

/** The slice of EC2Client this module sends through. */
export type EC2Sender = Pick<EC2Client, "send">;

export interface EC2InventoryConfig {
  region: string;
  /** For tests only: inject a custom EC2Client factory. */
  _ec2ClientFactory?: (region: string) => EC2Sender;
}

export class EC2Inventory {
  readonly name = "aws" as const;
  readonly region: string;

  private client?: EC2Sender;
  private ec2ClientFactory?: (region: string) => EC2Sender;

  constructor(config: EC2InventoryConfig) {
    this.region = config.region;
    this.ec2ClientFactory = config._ec2ClientFactory;
  }

  /** Created on first use; EC2 is regional, so one client per inventory. */
  private getClient(): EC2Sender {
    if (!this.client) {
      this.client = this.ec2ClientFactory
        ? this.ec2ClientFactory(this.region)
        : new EC2Client({ region: this.region });
    }
    return this.client;
  }

  // ─── listInstances ────────────────────────────────────────────────────────

  /**
   * Every instance in the region except terminated ones, from a single
   * DescribeInstances call (no pagination).
   */
  async listInstances(): Promise<ProviderResult<InstanceRecord[]>> {
    return withProviderResult(this.name, async () => {
      const result = await this.getClient().send(new DescribeInstancesCommand({}));
      return (result.Reservations ?? [])
        .flatMap((r) => r.Instances ?? [])
        .filter((inst) => inst.State?.Name !== "terminated")
        .map(toInstanceRecord)
        .filter((inst): inst is InstanceRecord => inst !== null);
    }, toEC2Error);
  }

  // ─── describeImageMetadata ────────────────────────────────────────────────

  /**
   * Resolve metadata for the given image ids, keyed by id in API order.
   * Ids the API does not return (deregistered, not shared) are absent.
   */
  async describeImageMetadata(
    imageIds: readonly string[],
  ): Promise<ProviderResult<Map<string, ImageMetadata>>> {
    if (imageIds.length === 0) {
      return ok(new Map<string, ImageMetadata>());
    }

    return withProviderResult(this.name, async () => {
      const result = await this.getClient().send(
        new DescribeImagesCommand({ ImageIds: [...imageIds] })
      );
      const now = new Date();
      const metadata = new Map<string, ImageMetadata>();
      for (const image of result.Images ?? []) {
        const info = toImageMetadata(image, now);
        if (info) metadata.set(info.imageId, info);
      }
      return metadata;
    }, toEC2Error);
  }

  // ─── findLatestImage ──────────────────────────────────────────────────────

  /**
   * Newest available image whose name matches `namePattern` (EC2 glob
   * semantics, evaluated server-side) for the given owner.
   * Resolves to null when nothing matches.
   */
  async findLatestImage(
    namePattern: string,
    owner: ImageOwner,
  ): Promise<ProviderResult<ImageDetail | null>> {
    return withProviderResult(this.name, async () => {
      const result = await this.getClient().send(
        new DescribeImagesCommand({
          Owners: [owner],
          Filters: [
            { Name: "name", Values: [namePattern] },
            { Name: "state", Values: ["available"] },
          ],
        })
      );
      const now = new Date();
      const images = (result.Images ?? [])
        .map((image) => toImageDetail(image, now))
        .filter((image): image is ImageDetail => image !== null);
      return selectLatestImage(images);
    }, toEC2Error);
  }
}
