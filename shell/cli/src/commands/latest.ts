// commands/latest.ts - amiwatch latest: newest AMI matching a name pattern

import { EXIT_CODES, type ExitCode } from '@amiwatch/contracts';
import { EC2Inventory } from '@amiwatch/inventory';
import { getOutputMode, output, printLines } from '../config';
import { reportProviderError, reportUsageError } from '../diagnostics';
import { parseLatestOptions, type LatestOptions } from '../options';
import { renderImageDetail, renderNoImageFound, renderSearchHeader, toImageData } from '../output/image-detail';
import type { CommandContext } from './context';

export const LATEST_USAGE =
  'Usage: amiwatch latest --region <region> [--name-pattern <glob>] [--owner <self|account-id>] [--rotation-days <n>]';

export async function latestCommand(args: string[], ctx: CommandContext = {}): Promise<ExitCode> {
  let options: LatestOptions;
  try {
    options = parseLatestOptions(args, ctx.env);
  } catch (err) {
    return reportUsageError(err, LATEST_USAGE);
  }

  const { region, namePattern, owner, rotationDays } = options;
  const inventory = new EC2Inventory({ region, _ec2ClientFactory: ctx.ec2ClientFactory });

  if (getOutputMode() !== 'json') {
    printLines(renderSearchHeader({ region, namePattern, owner }));
  }

  const result = await inventory.findLatestImage(namePattern, owner);
  if (!result.ok) {
    reportProviderError('Error fetching AMI information', result.error);
    return EXIT_CODES.PROVIDER_ERROR;
  }

  const search = { region, name_pattern: namePattern, owner, rotation_days: rotationDays };
  const image = result.value;
  if (!image) {
    output({ ...search, image: null }, () => {
      printLines(renderNoImageFound());
    });
    return EXIT_CODES.NOT_FOUND;
  }

  const now = new Date();
  output({ ...search, image: toImageData(image, rotationDays, now) }, () => {
    printLines(renderImageDetail(image, rotationDays, now));
  });
  return EXIT_CODES.OK;
}
