import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { getPackageInfo } from '../lib/utils/user-agent.js';
import { handleCleanupCommand, type CleanupCommandOptions } from './commands/cleanup.js';
import { handleIssueCommand, type IssueCommandOptions } from './commands/issue.js';
import { handleError } from './utils/errors.js';

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Expected a number of seconds >= 0.');
  }
  return seconds;
}

/** Build a Commander program instance for the acme-dns01-ovh CLI. */
export function createCli(): Command {
  const program = new Command();
  const { name, version } = getPackageInfo();

  program
    .name(name)
    .description('Wildcard certificates through ACME DNS-01 challenges on OVH DNS')
    .version(version);

  // In test mode help, version and usage errors throw instead of exiting
  if (process.env.ACME_DNS01_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.ACME_DNS01_CLI_TEST) return;
    process.exitCode = 1;
  }

  program
    .command('issue')
    .alias('run')
    .description('Obtain or renew the configured certificate')
    .option('-c, --config <path>', 'Configuration file', './config.json')
    .option('-d, --domain <domain...>', 'Domains to certify, replacing the configured list')
    .option('--zone <zone...>', 'OVH zones hosting the challenge records')
    .option('--staging', "Use Let's Encrypt staging environment")
    .option('--directory <url>', 'Custom ACME directory URL')
    .option('--propagation-wait <seconds>', 'Budget for the DNS propagation check', parseSeconds)
    .option('--on-propagation-timeout <policy>', 'proceed or abort when records are not visible in time')
    .option('--cert-algo <algo>', 'Certificate key algorithm (ec-p256, ec-p384, rsa-2048, rsa-3072, rsa-4096)')
    .option('--account-key <path>', 'ACME account key (JWK), generated when missing')
    .option('-o, --output <dir>', 'Directory receiving <name>.crt and <name>.key')
    .action(async (opts: IssueCommandOptions) => {
      try {
        await handleIssueCommand(opts);
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('cleanup')
    .description('Remove _acme-challenge TXT records left by interrupted runs')
    .option('-c, --config <path>', 'Configuration file', './config.json')
    .option('-d, --domain <domain...>', 'Domains whose challenge records are removed')
    .option('--zone <zone...>', 'OVH zones hosting the challenge records')
    .option('--all-records', 'Remove every _acme-challenge record of the zones')
    .action(async (opts: CleanupCommandOptions) => {
      try {
        await handleCleanupCommand(opts);
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** Parse arguments (without the node and script entries) and return the program */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    const ignored = ['commander.helpDisplayed', 'commander.version'];
    if (!(error instanceof CommanderError && ignored.includes(error.code))) {
      throw error;
    }
  }
  return program;
}
