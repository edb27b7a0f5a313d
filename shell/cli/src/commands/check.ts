// commands/check.ts - amiwatch check: instances, their AMIs, and rotation status

import { EXIT_CODES, type ExitCode, type ImageMetadata } from '@amiwatch/contracts';
import { EC2Inventory, selectExpiredImages, uniqueImageIds } from '@amiwatch/inventory';
import { getOutputMode, output, printLines } from '../config';
import { reportProviderError, reportUsageError } from '../diagnostics';
import { parseCheckOptions, type CheckOptions } from '../options';
import { renderAuditReport, toAuditData } from '../output/audit-report';
import type { CommandContext } from './context';

export const CHECK_USAGE = 'Usage: amiwatch check --region <region> [--rotation-days <n>] [--strict]';

export async function checkCommand(args: string[], ctx: CommandContext = {}): Promise<ExitCode> {
  let options: CheckOptions;
  try {
    options = parseCheckOptions(args, ctx.env);
  } catch (err) {
    return reportUsageError(err, CHECK_USAGE);
  }

  const { region, rotationDays } = options;
  const inventory = new EC2Inventory({ region, _ec2ClientFactory: ctx.ec2ClientFactory });
  const json = getOutputMode() === 'json';

  if (!json) {
    console.log(`Checking EC2 instances in region: ${region}`);
    console.log('='.repeat(50));
  }

  const instances = await inventory.listInstances();
  if (!instances.ok) {
    reportProviderError('Error fetching EC2 instances', instances.error);
    return EXIT_CODES.PROVIDER_ERROR;
  }

  if (instances.value.length === 0) {
    output(toAuditData(region, { instances: [], metadata: new Map(), expired: [], rotationDays }), () => {
      console.log('No EC2 instances found.');
    });
    return EXIT_CODES.OK;
  }

  // Image lookup depends on the instance list, so it runs second
  const imageResult = await inventory.describeImageMetadata(uniqueImageIds(instances.value));
  const metadata = imageResult.ok ? imageResult.value : new Map<string, ImageMetadata>();
  const report = {
    instances: instances.value,
    metadata,
    expired: selectExpiredImages(metadata, rotationDays),
    rotationDays,
    imagesUnavailable: !imageResult.ok,
  };

  if (!imageResult.ok) {
    reportProviderError('Error fetching AMI information', imageResult.error, json ? toAuditData(region, report) : undefined);
    if (json) return EXIT_CODES.PROVIDER_ERROR;
  }

  output(toAuditData(region, report), () => {
    printLines(renderAuditReport(report));
  });

  if (!imageResult.ok) return EXIT_CODES.PROVIDER_ERROR;
  if (options.strict && report.expired.length > 0) return EXIT_CODES.NON_COMPLIANT;
  return EXIT_CODES.OK;
}
