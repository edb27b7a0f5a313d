// index.ts - Re-exports from all modules

// Types & primitives
export type {
  DurationDays,
  ProviderName,
  ProviderInstanceId,
  ProviderImageId,
  ImageOwner,
  InstanceRecord,
  ImageMetadata,
  ImageTag,
  BlockDeviceRecord,
  ImageDetail,
  ErrorCategory,
  ExitCode,
} from './types';

export {
  EXIT_CODES,
  parseCreationDate,
  ageInDays,
  formatUtcSeconds,
} from './types';

// Result envelope
export type { Result } from './result';
export { ok, err } from './result';

// Errors
export {
  AmiwatchError,
  ValidationError,
  describeError,
} from './errors';

// Configuration
export {
  ROTATION_POLICY,
  DEFAULT_NAME_PATTERN,
  NAME_PATTERN_ENV_KEY,
  parseRotationDays,
  getRotationDays,
  getDefaultNamePattern,
} from './config/rotation';
