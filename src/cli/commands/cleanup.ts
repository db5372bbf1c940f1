import { cleanup, loadConfig } from '../../lib/index.js';
import { createSpinner, createSpinnerLogger, render } from '../logger.js';

export interface CleanupCommandOptions {
  config: string;
  domain?: string[];
  zone?: string[];
  /** Every `_acme-challenge` record of the zones, not only those of the domains */
  allRecords?: boolean;
}

/** Remove challenge records left behind by interrupted runs */
export async function handleCleanupCommand(options: CleanupCommandOptions): Promise<void> {
  const config = await loadConfig(options.config, {
    overrides: { domains: options.domain, zones: options.zone },
  });

  const spinner = createSpinner().start('Listing _acme-challenge records');
  try {
    const report = await cleanup(config, {
      logger: createSpinnerLogger(spinner),
      scope: options.allRecords ? 'zones' : 'domains',
    });

    if (report.failed.length) {
      spinner.fail(`${report.failed.length} record(s) could not be deleted`);
      render.list(report.failed.map(({ record, reason }) => `${record.recordName}: ${reason}`));
      throw new Error(`Cleanup incomplete: ${report.failed.length} record(s) left`);
    }

    spinner.succeed(
      report.deleted.length ? `Deleted ${report.deleted.length} challenge record(s)` : 'No challenge records found',
    );
  } finally {
    spinner.stop();
  }
}
