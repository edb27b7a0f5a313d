import { join } from 'path';
import { EXIT_CODES, type ExitCode } from '@amiwatch/contracts';
import { AMIWATCH_DIR, loadEnvFile, setOutputMode } from './config';
import { checkCommand, CHECK_USAGE } from './commands/check';
import { latestCommand, LATEST_USAGE } from './commands/latest';
import type { CommandContext } from './commands/context';

/**
 * Extract --json from the raw argv array.
 * Returns the remaining args with that flag stripped.
 */
function parseGlobalFlags(args: string[]): { json: boolean; remainingArgs: string[] } {
  let json = false;
  const remainingArgs: string[] = [];
  for (const arg of args) {
    if (arg === '--json') { json = true; }
    else { remainingArgs.push(arg); }
  }
  return { json, remainingArgs };
}

function printUsage(exitCode: ExitCode): ExitCode {
  const out = exitCode === EXIT_CODES.OK ? console.log : console.error;
  out('Usage: amiwatch <command> [options]');
  out('');
  out('Commands:');
  out('  check --region <region>     List instances and their AMIs, flag AMIs past rotation');
  out('        [--rotation-days <n>] Rotation threshold in days (default: 90, env AMIWATCH_ROTATION_DAYS)');
  out('        [--strict]            Exit 3 when any AMI is past rotation');
  out('  latest --region <region>    Find the newest AMI matching a name pattern');
  out('        [--name-pattern <glob>] Default: *company-abc* (env AMIWATCH_NAME_PATTERN)');
  out('        [--owner <owner>]     self (default), amazon, aws-marketplace or an account id');
  out('        [--rotation-days <n>]');
  out('  help                        Show this help');
  out('');
  out('Global flags (before or after command):');
  out('  --json                      Output as JSON ({ "status": ..., "data": ... } envelope)');
  out('');
  out('Exit codes: 0 ok, 1 AWS call failed, 2 usage error, 3 AMIs past rotation (--strict), 4 no AMI found');
  return exitCode;
}

export interface RunCliOptions extends CommandContext {
  /** Env file read before dispatch; defaults to ~/.amiwatch/cli.env */
  envFile?: string;
}

/** Parse argv (without the node/script prefix), dispatch, and return the exit code. */
export async function runCli(argv: string[], opts: RunCliOptions = {}): Promise<ExitCode> {
  const env = opts.env ?? process.env;
  loadEnvFile(opts.envFile ?? join(AMIWATCH_DIR, 'cli.env'), env);

  const { json, remainingArgs: args } = parseGlobalFlags(argv);
  setOutputMode(json ? 'json' : 'normal');

  const command = args[0];
  const commandArgs = args.slice(1);

  if (command === undefined || command === '-h' || command === '--help' || command === 'help') {
    return printUsage(EXIT_CODES.OK);
  }

  const wantsHelp = commandArgs.includes('--help') || commandArgs.includes('-h');
  if (wantsHelp && (command === 'check' || command === 'latest')) {
    console.log(command === 'latest' ? LATEST_USAGE : CHECK_USAGE);
    return EXIT_CODES.OK;
  }

  const ctx: CommandContext = { env, ec2ClientFactory: opts.ec2ClientFactory };
  switch (command) {
    case 'check':
      return checkCommand(commandArgs, ctx);
    case 'latest':
      return latestCommand(commandArgs, ctx);
    default:
      console.error(`Unknown command: ${command}`);
      return printUsage(EXIT_CODES.USAGE);
  }
}
