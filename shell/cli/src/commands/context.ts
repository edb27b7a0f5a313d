import type { EC2Sender } from '@amiwatch/inventory';

/** What a command reads from its surroundings; tests substitute both. */
export interface CommandContext {
  env?: Record<string, string | undefined>;
  /** For tests only: inject a custom EC2Client factory. */
  ec2ClientFactory?: (region: string) => EC2Sender;
}
