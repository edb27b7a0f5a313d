// index.ts - Public surface of the inventory package

export {
  EC2Inventory,
  getAwsErrorCode,
  mapEC2Error,
  toInstanceRecord,
  toImageMetadata,
  toImageDetail,
  type EC2InventoryConfig,
  type EC2Sender,
} from "./provider/compute/aws";
export {
  ProviderOperationError,
  ConcreteProviderError,
  withProviderResult,
  mapProviderOperationError,
  categorizeErrorCode,
  type ProviderOperationErrorCode,
  type ProviderOperationErrorCategory,
  type ProviderResult,
} from "./provider/errors";
export { uniqueImageIds, selectLatestImage } from "./audit/images";
export { isPastRotation, selectExpiredImages } from "./audit/rotation";
