import type { DnsProviderGateway, TxtRecord } from '../dns/dns-provider-gateway.js';
import { mapDomainsToTargets } from '../dns/record-mapper.js';
import { debugCleanup } from '../utils/debug.js';
import { createDebugLogger, describeError, type Logger } from '../utils/logger.js';

export interface PurgeOptions {
  /** Purge the `_acme-challenge` names of these domains */
  domains?: readonly string[];
  /** Purge every `_acme-challenge` record of these zones */
  zones?: readonly string[];
  logger?: Logger;
}

export interface PurgeFailure {
  record: TxtRecord;
  reason: string;
}

export interface PurgeReport {
  deleted: TxtRecord[];
  failed: PurgeFailure[];
}

/**
 * Remove leftover challenge records outside of a run.
 *
 * With `domains`, only the records at their challenge names are listed (the
 * zones then only help locating them); otherwise every challenge record of
 * each zone is. Each touched zone is refreshed once at the end.
 */
export async function purgeChallengeRecords(
  gateway: DnsProviderGateway,
  options: PurgeOptions = {},
): Promise<PurgeReport> {
  const logger = options.logger ?? createDebugLogger(debugCleanup);
  const report: PurgeReport = { deleted: [], failed: [] };

  const candidates: TxtRecord[] = [];
  if (options.domains?.length) {
    for (const target of mapDomainsToTargets(options.domains, { zones: options.zones })) {
      candidates.push(...(await gateway.listTxtRecords(target.recordName)));
    }
  } else {
    for (const zone of options.zones ?? []) {
      candidates.push(...(await gateway.listChallengeRecords(zone)));
    }
  }
  debugCleanup('%d challenge record(s) found', candidates.length);

  const touched = new Set<string>();
  for (const record of candidates) {
    try {
      await gateway.deleteTxtRecord(record.recordId);
      report.deleted.push(record);
      touched.add(record.recordId.zone);
      logger.info(`Deleted ${record.recordName} (id ${record.recordId.id})`);
    } catch (error) {
      report.failed.push({ record, reason: describeError(error) });
      logger.error(`Could not delete ${record.recordName} (id ${record.recordId.id}): ${describeError(error)}`);
    }
  }

  for (const zone of touched) {
    await gateway.refreshZone(zone);
  }

  return report;
}
